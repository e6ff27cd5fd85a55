/**
 * saveRepository.ts
 *
 * Named save slots in a single `saves` table.  The full record is kept as a
 * JSON payload; tick, age and save time are copied into columns so listing
 * the slots never has to parse payloads.
 */

import type { Knex } from 'knex';
import { z } from 'zod';
import type { SaveStore, SaveSummary } from '../simulation/commands';
import type { SaveRecord } from '../simulation/snapshot';

export const SAVES_TABLE = 'saves';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

export const ensureSaveSchema = async (db: Knex): Promise<void> => {
    if (await db.schema.hasTable(SAVES_TABLE)) {
        return;
    }
    await db.schema.createTable(SAVES_TABLE, (table) => {
        table.string('name', 64).primary();
        table.string('saved_at').notNullable();
        table.integer('tick').notNullable();
        table.string('age').notNullable();
        table.text('payload').notNullable();
    });
};

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/**
 * Write a record under `name`, replacing whatever was saved there before.
 */
export const saveGameRecord = async (
    db: Knex,
    name: string,
    record: SaveRecord,
    now: number = Date.now(),
): Promise<void> => {
    await db(SAVES_TABLE)
        .insert({
            name,
            saved_at: record.timestamp ?? new Date(now).toISOString(),
            tick: record.tick,
            age: record.age,
            payload: JSON.stringify(record),
        })
        .onConflict('name')
        .merge();
};

// ---------------------------------------------------------------------------
// Read operations
// ---------------------------------------------------------------------------

const payloadRowSchema = z.object({ payload: z.string() });

const summaryRowSchema = z.object({
    name: z.string(),
    saved_at: z.string(),
    tick: z.coerce.number(),
    age: z.string(),
});

/**
 * The raw JSON payload saved under `name`, or null when there is none.
 * Validation is left to the caller.
 */
export const loadGameRecord = async (db: Knex, name: string): Promise<string | null> => {
    const row: unknown = await db(SAVES_TABLE).where({ name }).first('payload');
    if (row === undefined) {
        return null;
    }
    return payloadRowSchema.parse(row).payload;
};

export const listSaves = async (db: Knex): Promise<SaveSummary[]> => {
    const rows: unknown[] = await db(SAVES_TABLE).select('name', 'saved_at', 'tick', 'age').orderBy('name', 'asc');
    return rows.map((raw) => {
        const row = summaryRowSchema.parse(raw);
        return { name: row.name, savedAt: row.saved_at, tick: row.tick, age: row.age };
    });
};

/**
 * A SaveStore over `db`.  The table is created on first use.
 */
export function createKnexSaveStore(db: Knex): SaveStore {
    let ready: Promise<void> | null = null;
    const schema = (): Promise<void> => {
        if (ready === null) {
            ready = ensureSaveSchema(db).catch((err: unknown) => {
                ready = null;
                throw err;
            });
        }
        return ready;
    };

    return {
        async save(name, record) {
            await schema();
            await saveGameRecord(db, name, record);
        },
        async load(name) {
            await schema();
            return loadGameRecord(db, name);
        },
        async list() {
            await schema();
            return listSaves(db);
        },
    };
}
