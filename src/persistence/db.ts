import fs from 'node:fs';
import path from 'node:path';
import knex from 'knex';
import type { Knex } from 'knex';

export const IN_MEMORY = ':memory:';

/**
 * Open the SQLite file that holds the save slots, creating its directory
 * first.  Pass ':memory:' for a throwaway database.
 */
export function createSaveDatabase(filename: string): Knex {
    if (filename !== IN_MEMORY) {
        fs.mkdirSync(path.dirname(path.resolve(filename)), { recursive: true });
    }
    return knex({
        client: 'better-sqlite3',
        connection: { filename },
        useNullAsDefault: true,
    });
}
