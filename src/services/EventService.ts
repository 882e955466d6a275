import { Op, WhereOptions } from 'sequelize';
import { ClubEvent } from '../models';
import { InvalidInputError, NotFoundError, withStorage } from '../utils/errors';
import { normalizeText, optionalText, parseBoolean, parseDay, parseMonth } from '../utils/parse';

export interface EventInput {
    name?: unknown;
    description?: unknown;
    event_date?: unknown;
    registration_open?: unknown;
}

const findEventOrFail = async (id: string) => {
    const event = await withStorage(() => ClubEvent.findByPk(id));
    if (!event) throw new NotFoundError(`Event ${id} not found`);
    return event;
};

const readDay = (value: unknown) => {
    const day = parseDay(value);
    if (!day) throw new InvalidInputError('event_date must be a valid date (YYYY-MM-DD)');
    return day;
};

const readRegistration = (value: unknown) => {
    const open = parseBoolean(value);
    if (open === null) throw new InvalidInputError('registration_open must be true or false');
    return open;
};

export class EventService {
    /** Events in date order, optionally limited to one `YYYY-MM` month. */
    static async list(month?: string) {
        let where: WhereOptions = {};
        if (month) {
            const range = parseMonth(month);
            if (!range) throw new InvalidInputError('month must be YYYY-MM');
            where = { event_date: { [Op.between]: [range.first, range.last] } };
        }
        return withStorage(() => ClubEvent.findAll({
            where,
            order: [['event_date', 'ASC'], ['name', 'ASC']],
        }));
    }

    static async get(id: string) {
        return findEventOrFail(id);
    }

    static async create(input: EventInput) {
        const name = normalizeText(input.name);
        if (!name) throw new InvalidInputError('Event name is required');
        const eventDate = readDay(input.event_date);
        const registrationOpen = input.registration_open === undefined ? true : readRegistration(input.registration_open);

        return withStorage(() => ClubEvent.create({
            name,
            description: optionalText(input.description),
            event_date: eventDate,
            registration_open: registrationOpen,
        }));
    }

    static async update(id: string, input: EventInput) {
        const event = await findEventOrFail(id);
        const updates: { name?: string; description?: string | null; event_date?: string; registration_open?: boolean } = {};

        if (input.name !== undefined) {
            const name = normalizeText(input.name);
            if (!name) throw new InvalidInputError('Event name cannot be empty');
            updates.name = name;
        }
        if (input.description !== undefined) updates.description = optionalText(input.description);
        if (input.event_date !== undefined) updates.event_date = readDay(input.event_date);
        if (input.registration_open !== undefined) updates.registration_open = readRegistration(input.registration_open);

        return withStorage(() => event.update(updates));
    }

    static async remove(id: string) {
        const event = await findEventOrFail(id);
        await withStorage(() => event.destroy());
    }
}
