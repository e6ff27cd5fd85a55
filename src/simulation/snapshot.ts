/**
 * snapshot.ts
 *
 * Two views of a GameState:
 *   - StateSnapshot: everything the dashboard renders, derived values included.
 *   - SaveRecord: the flat record written to the save store.
 *
 * Restoring a record is all-or-nothing.  The record is parsed and checked
 * against the catalog into a complete new GameState before anything live is
 * touched; any problem surfaces as a SaveFormatError.
 */

import { z } from 'zod';
import { villagerCapacity, createBuildingRegistry } from './buildings';
import { technologyDefinition, workerTypeDefinition } from './catalog';
import { IDLE_TASK } from './constants';
import type { GameState } from './engine';
import { isKnownAge } from './progression';
import type { AdvancementProgress } from './progression';
import { advancementProgress } from './progression';
import { applyResearchBonuses, createResearchState, researchProgress } from './research';
import { createResourceLedger, totalFood } from './resources';
import type { GameStats } from './stats';
import { createStats, GAME_EVENT_TYPES } from './stats';
import type { WorkerGroup } from './workforce';
import { createWorkforce, emptyWorkerGroup, foodUpkeep } from './workforce';

// ---------------------------------------------------------------------------
// Dashboard snapshot
// ---------------------------------------------------------------------------

export type StateSnapshot = {
    age: string;
    tick: number;
    tickIntervalMs: number;
    resources: Record<string, number>;
    totalFood: number;
    foodUpkeep: number;
    buildings: Record<string, number>;
    workforce: Record<string, WorkerGroup>;
    villagerCapacity: number;
    research: {
        current: string | null;
        progress: number;
        cost: number;
        researched: string[];
    };
    effectiveRates: Record<string, number>;
    nextAge: AdvancementProgress | null;
};

const copyWorkforce = (workforce: Record<string, WorkerGroup>): Record<string, WorkerGroup> =>
    Object.fromEntries(
        Object.entries(workforce).map(([type, group]) => [
            type,
            { count: group.count, assignment: { ...group.assignment } },
        ]),
    );

export const toStateSnapshot = (state: GameState, tickIntervalMs: number): StateSnapshot => ({
    age: state.age,
    tick: state.tick,
    tickIntervalMs,
    resources: { ...state.resources.stocks },
    totalFood: totalFood(state.resources),
    foodUpkeep: foodUpkeep(state.workforce),
    buildings: { ...state.buildings.counts },
    workforce: copyWorkforce(state.workforce),
    villagerCapacity: villagerCapacity(state.buildings),
    research: { ...researchProgress(state.research), researched: [...state.research.researched] },
    effectiveRates: applyResearchBonuses(state.resources.collectionRates, state.research),
    nextAge: advancementProgress(state.resources, state.buildings, state.age),
});

// ---------------------------------------------------------------------------
// Save record
// ---------------------------------------------------------------------------

export class SaveFormatError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SaveFormatError';
    }
}

const isoTimestamp = z.string().datetime({ offset: true });
const nonNegativeInt = z.number().int().nonnegative();

const statsSchema = z.object({
    events: z.array(
        z.object({
            tick: nonNegativeInt,
            timestamp: isoTimestamp,
            eventType: z.enum(GAME_EVENT_TYPES),
            message: z.string(),
        }),
    ),
    resourcesGathered: z.record(z.string(), z.number().nonnegative()),
    buildingsBuilt: z.record(z.string(), nonNegativeInt),
    villagersRecruited: z.record(z.string(), nonNegativeInt),
    agesReached: z.array(z.string()),
    startTime: isoTimestamp,
});

export const saveRecordSchema = z.object({
    timestamp: isoTimestamp.optional(),
    tick: nonNegativeInt.default(0),
    age: z.string({ required_error: "save is missing required 'age' field" }).min(1),
    resources: z.record(z.string(), z.number().nonnegative(), {
        required_error: "save is missing required 'resources' field",
    }),
    buildings: z.record(z.string(), nonNegativeInt).optional(),
    villagers: z
        .record(
            z.string(),
            z.object({
                count: nonNegativeInt,
                assignment: z.record(z.string(), nonNegativeInt),
            }),
        )
        .optional(),
    research: z
        .object({
            current: z.string().nullable(),
            progress: z.number().nonnegative(),
            researched: z.array(z.string()),
        })
        .optional(),
    stats: statsSchema.optional(),
    lastUpdateTime: isoTimestamp.optional(),
});

export type SaveRecord = z.infer<typeof saveRecordSchema>;

export const toSaveRecord = (state: GameState, now: number = Date.now()): SaveRecord => ({
    timestamp: new Date(now).toISOString(),
    tick: state.tick,
    age: state.age,
    resources: { ...state.resources.stocks },
    buildings: { ...state.buildings.counts },
    villagers: copyWorkforce(state.workforce),
    research: {
        current: state.research.current,
        progress: state.research.progress,
        researched: [...state.research.researched],
    },
    stats: structuredClone(state.stats),
    lastUpdateTime: new Date(state.lastUpdateTime).toISOString(),
});

/**
 * Validate raw save data (a parsed object or its JSON text) into a SaveRecord.
 */
export const parseSaveRecord = (raw: unknown): SaveRecord => {
    let data: unknown = raw;
    if (typeof raw === 'string') {
        try {
            data = JSON.parse(raw);
        } catch (err) {
            throw new SaveFormatError(`save data is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
        }
    }
    if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        throw new SaveFormatError('save data is not a record');
    }

    const result = saveRecordSchema.safeParse(data);
    if (!result.success) {
        const details = result.error.issues.map((issue) =>
            issue.message.startsWith('save is missing') ? issue.message : `${issue.path.join('.')}: ${issue.message}`,
        );
        throw new SaveFormatError(details.join('; '));
    }
    return result.data;
};

const restoreWorkerGroup = (workerType: string, saved: WorkerGroup): WorkerGroup => {
    const definition = workerTypeDefinition(workerType);
    const group = emptyWorkerGroup(workerType);
    if (!definition || !group) {
        throw new SaveFormatError(`save lists unknown worker type '${workerType}'`);
    }

    let assigned = 0;
    for (const [task, count] of Object.entries(saved.assignment)) {
        if (task !== IDLE_TASK && !definition.tasks.includes(task)) {
            throw new SaveFormatError(`save assigns ${workerType} to unknown task '${task}'`);
        }
        group.assignment[task] = count;
        assigned += count;
    }
    if (assigned !== saved.count) {
        throw new SaveFormatError(`save has ${saved.count} ${workerType}s but ${assigned} assigned`);
    }
    group.count = saved.count;
    return group;
};

const restoreResearch = (saved: SaveRecord['research']): GameState['research'] => {
    const research = createResearchState();
    if (!saved) {
        return research;
    }
    for (const name of [...saved.researched, ...(saved.current === null ? [] : [saved.current])]) {
        if (!technologyDefinition(name)) {
            throw new SaveFormatError(`save references unknown technology '${name}'`);
        }
    }
    if (saved.current !== null && saved.researched.includes(saved.current)) {
        throw new SaveFormatError(`save is researching '${saved.current}' which is already researched`);
    }
    research.current = saved.current;
    research.progress = saved.current === null ? 0 : saved.progress;
    research.researched = [...new Set(saved.researched)];
    return research;
};

/**
 * Build a complete GameState from a parsed record.  Optional parts the record
 * lacks fall back to fresh defaults; references the catalog does not know
 * reject the whole record.
 */
export const restoreGameState = (record: SaveRecord, now: number = Date.now()): GameState => {
    if (!isKnownAge(record.age)) {
        throw new SaveFormatError(`save references unknown age '${record.age}'`);
    }

    const resources = createResourceLedger();
    for (const [name, amount] of Object.entries(record.resources)) {
        if (!Object.hasOwn(resources.stocks, name)) {
            throw new SaveFormatError(`save references unknown resource '${name}'`);
        }
        resources.stocks[name] = amount;
    }

    const buildings = createBuildingRegistry();
    for (const [name, count] of Object.entries(record.buildings ?? {})) {
        if (!Object.hasOwn(buildings.counts, name)) {
            throw new SaveFormatError(`save references unknown building '${name}'`);
        }
        buildings.counts[name] = count;
    }

    const workforce = createWorkforce();
    for (const [workerType, saved] of Object.entries(record.villagers ?? {})) {
        workforce[workerType] = restoreWorkerGroup(workerType, saved);
    }

    const stats: GameStats = record.stats ? structuredClone(record.stats) : createStats(record.age, now);
    const lastUpdateTime = record.lastUpdateTime ? Date.parse(record.lastUpdateTime) : now;

    return {
        tick: record.tick,
        age: record.age,
        lastUpdateTime,
        resources,
        buildings,
        workforce,
        research: restoreResearch(record.research),
        stats,
    };
};
