import {
    ConnectionError,
    DatabaseError,
    ForeignKeyConstraintError,
    TimeoutError,
    UniqueConstraintError,
    ValidationError,
} from 'sequelize';

export type AppErrorCode =
    | 'STORAGE_UNAVAILABLE'
    | 'STORAGE_REJECTED'
    | 'INVALID_INPUT'
    | 'NOT_FOUND'
    | 'CONFLICT'
    | 'INVOICE_CONFLICT'
    | 'INSUFFICIENT_POINTS';

export class AppError extends Error {
    code: AppErrorCode;
    status: number;
    details?: Record<string, unknown>;

    constructor(code: AppErrorCode, status: number, message: string, details?: Record<string, unknown>) {
        super(message);
        this.name = 'AppError';
        this.code = code;
        this.status = status;
        this.details = details;
    }
}

/** Transient: the caller may retry. */
export class StorageUnavailableError extends AppError {
    cause: unknown;

    constructor(message: string, cause?: unknown) {
        super('STORAGE_UNAVAILABLE', 503, message);
        this.name = 'StorageUnavailableError';
        this.cause = cause;
    }
}

/** The database refused the write or the query; retrying the same input fails again. */
export class StorageRejectedError extends AppError {
    cause: unknown;

    constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
        super('STORAGE_REJECTED', 422, message, details);
        this.name = 'StorageRejectedError';
        this.cause = cause;
    }
}

export class InvalidInputError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('INVALID_INPUT', 400, message, details);
        this.name = 'InvalidInputError';
    }
}

export class NotFoundError extends AppError {
    constructor(message: string) {
        super('NOT_FOUND', 404, message);
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('CONFLICT', 409, message, details);
        this.name = 'ConflictError';
    }
}

export class InvoiceConflictError extends AppError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('INVOICE_CONFLICT', 409, message, details);
        this.name = 'InvoiceConflictError';
    }
}

export class InsufficientPointsError extends AppError {
    constructor(balance: number, required: number) {
        super('INSUFFICIENT_POINTS', 409, `Insufficient points: ${balance} available, ${required} required`, { balance, required });
        this.name = 'InsufficientPointsError';
    }
}

/**
 * Maps a Sequelize failure onto the storage taxonomy. Errors that are already
 * an AppError, or that did not come from Sequelize, are returned unchanged.
 */
export const translateStorageError = (error: unknown): unknown => {
    if (error instanceof AppError) return error;

    // TimeoutError extends DatabaseError, so it has to be checked first.
    if (error instanceof ConnectionError || error instanceof TimeoutError) {
        return new StorageUnavailableError(`Storage unavailable: ${error.message}`, error);
    }
    if (error instanceof UniqueConstraintError) {
        return new StorageRejectedError(
            'Duplicate value violates a unique constraint',
            { fields: error.fields },
            error
        );
    }
    if (error instanceof ValidationError) {
        return new StorageRejectedError(
            'Data failed validation',
            { errors: error.errors.map((item) => item.message) },
            error
        );
    }
    if (error instanceof ForeignKeyConstraintError) {
        return new StorageRejectedError(
            'Referenced record is missing or still in use',
            { table: error.table, fields: error.fields },
            error
        );
    }
    if (error instanceof DatabaseError) {
        return new StorageRejectedError(`Storage rejected the query: ${error.message}`, undefined, error);
    }
    return error;
};

/** Runs a storage call and rethrows any failure in the storage taxonomy. */
export const withStorage = async <T>(operation: () => Promise<T>): Promise<T> => {
    try {
        return await operation();
    } catch (error) {
        throw translateStorageError(error);
    }
};
