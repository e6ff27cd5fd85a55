import type { Knex } from 'knex';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { createGameState } from '../simulation/engine';
import { toSaveRecord } from '../simulation/snapshot';
import { createSaveDatabase, IN_MEMORY } from './db';
import { createKnexSaveStore, ensureSaveSchema, listSaves, loadGameRecord, saveGameRecord } from './saveRepository';

describe('saveRepository', () => {
    let db: Knex;

    beforeEach(async () => {
        db = createSaveDatabase(IN_MEMORY);
        await ensureSaveSchema(db);
    });

    afterEach(async () => {
        await db.destroy();
    });

    it('returns null for a slot that was never written', async () => {
        expect(await loadGameRecord(db, 'missing')).toBeNull();
    });

    it('stores the record as JSON and summarises it in the listing', async () => {
        const state = createGameState(0);
        state.tick = 12;
        const record = toSaveRecord(state, 5_000);

        await saveGameRecord(db, 'alpha', record);

        const payload = await loadGameRecord(db, 'alpha');
        expect(payload === null ? null : JSON.parse(payload)).toEqual(record);
        expect(await listSaves(db)).toEqual([
            { name: 'alpha', savedAt: '1970-01-01T00:00:05.000Z', tick: 12, age: 'Stone Age' },
        ]);
    });

    it('overwrites an existing slot and lists slots by name', async () => {
        const state = createGameState(0);
        await saveGameRecord(db, 'beta', toSaveRecord(state, 1_000));
        await saveGameRecord(db, 'alpha', toSaveRecord(state, 1_000));
        state.tick = 3;
        await saveGameRecord(db, 'beta', toSaveRecord(state, 2_000));

        const saves = await listSaves(db);
        expect(saves.map((s) => [s.name, s.tick])).toEqual([
            ['alpha', 0],
            ['beta', 3],
        ]);
    });

    it('creates the table on first use through the store', async () => {
        const fresh = createSaveDatabase(IN_MEMORY);
        try {
            const store = createKnexSaveStore(fresh);
            expect(await store.list()).toEqual([]);
            await store.save('slot', toSaveRecord(createGameState(0), 0));
            expect(typeof (await store.load('slot'))).toBe('string');
        } finally {
            await fresh.destroy();
        }
    });
});
