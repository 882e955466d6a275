export const PAYMENT_METHODS = ['debit', 'credit', 'pix', 'cash'] as const;
export type PaymentMethod = typeof PAYMENT_METHODS[number];

export const ORDER_STATUSES = ['open', 'paid_debit', 'paid_credit', 'paid_pix', 'paid_cash'] as const;
export type OrderStatus = typeof ORDER_STATUSES[number];
export type PaidOrderStatus = Exclude<OrderStatus, 'open'>;

const PAID_STATUS_BY_METHOD: Record<PaymentMethod, PaidOrderStatus> = {
    debit: 'paid_debit',
    credit: 'paid_credit',
    pix: 'paid_pix',
    cash: 'paid_cash',
};

export const paidStatusFor = (method: PaymentMethod): PaidOrderStatus => PAID_STATUS_BY_METHOD[method];

export const parsePaymentMethod = (value: unknown): PaymentMethod | null => {
    if (typeof value !== 'string') return null;
    const normalized = value.trim().toLowerCase();
    return PAYMENT_METHODS.find((method) => method === normalized) ?? null;
};

export const isOrderStatus = (value: unknown): value is OrderStatus =>
    typeof value === 'string' && ORDER_STATUSES.some((status) => status === value);
