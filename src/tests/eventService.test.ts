import { ClubEvent } from '../models';
import { EventService } from '../services/EventService';
import { InvalidInputError, NotFoundError } from '../utils/errors';
import { toDayKey } from '../utils/forecast';
import { closeDatabase, resetDatabase } from './helpers/db';

const dayOf = (event: ClubEvent) => toDayKey(new Date(event.event_date));

describe('EventService', () => {
    beforeEach(resetDatabase);
    afterAll(closeDatabase);

    it('schedules events with registration open by default', async () => {
        const event = await EventService.create({ name: ' Sunset Volleyball ', event_date: '2026-03-14' });

        expect(event.name).toBe('Sunset Volleyball');
        expect(event.description).toBeNull();
        expect(event.registration_open).toBe(true);
        expect(dayOf(await EventService.get(event.id))).toBe('2026-03-14');
    });

    it('validates name, date and registration flag', async () => {
        await expect(EventService.create({ name: '', event_date: '2026-03-14' })).rejects.toBeInstanceOf(InvalidInputError);
        await expect(EventService.create({ name: 'Luau', event_date: '2026-02-30' }))
            .rejects.toThrow('event_date must be a valid date (YYYY-MM-DD)');
        await expect(EventService.create({ name: 'Luau', event_date: '14/03/2026' })).rejects.toBeInstanceOf(InvalidInputError);
        await expect(EventService.create({ name: 'Luau', event_date: '2026-03-14', registration_open: 'maybe' }))
            .rejects.toThrow('registration_open must be true or false');
        expect(await ClubEvent.count()).toBe(0);
    });

    it('lists events by date, optionally for one month', async () => {
        await EventService.create({ name: 'Luau', event_date: '2026-04-01' });
        await EventService.create({ name: 'Sunset Volleyball', event_date: '2026-03-31' });
        await EventService.create({ name: 'Beach Cleanup', event_date: '2026-03-01' });
        await EventService.create({ name: 'Acoustic Night', event_date: '2026-03-31' });
        await EventService.create({ name: 'Surf Clinic', event_date: '2026-02-28' });

        expect((await EventService.list()).map((event) => event.name)).toEqual([
            'Surf Clinic',
            'Beach Cleanup',
            'Acoustic Night',
            'Sunset Volleyball',
            'Luau',
        ]);
        expect((await EventService.list('2026-03')).map((event) => event.name)).toEqual([
            'Beach Cleanup',
            'Acoustic Night',
            'Sunset Volleyball',
        ]);
        expect(await EventService.list('2026-05')).toEqual([]);
    });

    it('rejects a malformed month', async () => {
        await expect(EventService.list('2026-13')).rejects.toThrow('month must be YYYY-MM');
        await expect(EventService.list('March')).rejects.toBeInstanceOf(InvalidInputError);
    });

    it('updates only the given fields', async () => {
        const event = await EventService.create({ name: 'Luau', description: 'Torches and music', event_date: '2026-04-01' });

        const updated = await EventService.update(event.id, { registration_open: 'false', event_date: '2026-04-02' });

        expect(updated.name).toBe('Luau');
        expect(updated.description).toBe('Torches and music');
        expect(updated.registration_open).toBe(false);
        expect(dayOf(await EventService.get(event.id))).toBe('2026-04-02');
        await expect(EventService.update(event.id, { name: '  ' })).rejects.toThrow('Event name cannot be empty');
    });

    it('removes events and reports unknown ones', async () => {
        const event = await EventService.create({ name: 'Luau', event_date: '2026-04-01' });

        await EventService.remove(event.id);

        await expect(EventService.get(event.id)).rejects.toBeInstanceOf(NotFoundError);
        await expect(EventService.remove(event.id)).rejects.toThrow(`Event ${event.id} not found`);
    });
});
