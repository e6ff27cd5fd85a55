/**
 * workforce.ts
 *
 * Worker populations and their task assignments.
 *
 * Data model
 * ----------
 * Workforce maps a worker type to its head count and an assignment record
 * keyed by task.  The reserved `idle` task holds everybody without a job, so
 * for every worker type the assignment values always sum to `count`:
 *   - new hires arrive idle,
 *   - removals take idle workers first, then drain the type's tasks in the
 *     order the catalog declares them.
 *
 * Gathering
 * ---------
 * Each tick a task with n workers yields
 *     n × baseRate × typeModifier × (1 + buildingBonus)
 * where typeModifier is the worker type's knowledge modifier on the
 * knowledge task and 1 elsewhere.  Hunting also drops
 *     baseRate × HUNTING_FOOD_BONUS × n
 * into the food pool, untouched by building bonuses.  Upkeep is paid out of
 * the food pool afterwards.
 */

import type { BuildingRegistry } from './buildings';
import { collectionRateBonus } from './buildings';
import { catalog, workerTypeDefinition } from './catalog';
import { FOOD, HUNTING_FOOD_BONUS, HUNTING_TASK, IDLE_TASK, KNOWLEDGE_TASK } from './constants';
import type { ResourceLedger } from './resources';
import { addResource, drainFood, getCollectionRate } from './resources';

export type WorkerGroup = {
    count: number;
    assignment: Record<string, number>;
};

export type Workforce = Record<string, WorkerGroup>;

/** Receives every gathered amount, once per task per tick. */
export type GatherSink = (resource: string, amount: number) => void;

export type UpkeepResult = {
    required: number;
    paid: number;
};

const isPositiveCount = (count: number): boolean => Number.isInteger(count) && count > 0;

export const emptyWorkerGroup = (workerType: string): WorkerGroup | undefined => {
    const definition = workerTypeDefinition(workerType);
    if (!definition) {
        return undefined;
    }
    const assignment: Record<string, number> = {};
    for (const task of definition.tasks) {
        assignment[task] = 0;
    }
    assignment[IDLE_TASK] = 0;
    return { count: 0, assignment };
};

export const createWorkforce = (): Workforce => {
    const workforce: Workforce = {};
    for (const definition of catalog.workerTypes) {
        const group = emptyWorkerGroup(definition.name);
        if (group) {
            workforce[definition.name] = group;
        }
    }
    return workforce;
};

const groupOf = (workforce: Workforce, workerType: string): WorkerGroup | undefined =>
    Object.hasOwn(workforce, workerType) ? workforce[workerType] : undefined;

export const canPerform = (workerType: string, task: string): boolean =>
    task !== IDLE_TASK && (workerTypeDefinition(workerType)?.tasks.includes(task) ?? false);

export const workerCount = (workforce: Workforce, workerType: string): number =>
    groupOf(workforce, workerType)?.count ?? 0;

export const idleCount = (workforce: Workforce, workerType: string): number =>
    groupOf(workforce, workerType)?.assignment[IDLE_TASK] ?? 0;

export const totalWorkers = (workforce: Workforce): number =>
    Object.values(workforce).reduce((sum, group) => sum + group.count, 0);

/** Hire `count` workers of a type; they start idle. */
export const addWorkers = (workforce: Workforce, workerType: string, count: number): boolean => {
    const group = groupOf(workforce, workerType);
    if (!group || !isPositiveCount(count)) {
        return false;
    }
    group.count += count;
    group.assignment[IDLE_TASK] += count;
    return true;
};

export const removeWorkers = (workforce: Workforce, workerType: string, count: number): boolean => {
    const group = groupOf(workforce, workerType);
    const definition = workerTypeDefinition(workerType);
    if (!group || !definition || !isPositiveCount(count) || group.count < count) {
        return false;
    }

    group.count -= count;

    const fromIdle = Math.min(group.assignment[IDLE_TASK], count);
    group.assignment[IDLE_TASK] -= fromIdle;
    let remaining = count - fromIdle;

    for (const task of definition.tasks) {
        if (remaining <= 0) {
            break;
        }
        const taken = Math.min(group.assignment[task] ?? 0, remaining);
        group.assignment[task] -= taken;
        remaining -= taken;
    }
    return true;
};

/** Move `count` idle workers of a type onto a task. */
export const assignWorkers = (workforce: Workforce, workerType: string, task: string, count: number): boolean => {
    const group = groupOf(workforce, workerType);
    if (!group || !canPerform(workerType, task) || !isPositiveCount(count)) {
        return false;
    }
    if (group.assignment[IDLE_TASK] < count) {
        return false;
    }
    group.assignment[task] = (group.assignment[task] ?? 0) + count;
    group.assignment[IDLE_TASK] -= count;
    return true;
};

export const unassignWorkers = (workforce: Workforce, workerType: string, task: string, count: number): boolean => {
    const group = groupOf(workforce, workerType);
    if (!group || !canPerform(workerType, task) || !isPositiveCount(count)) {
        return false;
    }
    if ((group.assignment[task] ?? 0) < count) {
        return false;
    }
    group.assignment[task] -= count;
    group.assignment[IDLE_TASK] += count;
    return true;
};

/** Food eaten per tick by the whole population. */
export const foodUpkeep = (workforce: Workforce): number => {
    let total = 0;
    for (const definition of catalog.workerTypes) {
        total += workerCount(workforce, definition.name) * definition.upkeep;
    }
    return total;
};

const typeModifier = (workerType: string, task: string): number =>
    task === KNOWLEDGE_TASK ? (workerTypeDefinition(workerType)?.knowledgeModifier ?? 1) : 1;

/** Credit one tick of gathering for every working task to the ledger. */
export const gatherResources = (
    workforce: Workforce,
    ledger: ResourceLedger,
    buildings: BuildingRegistry,
    sink: GatherSink,
): void => {
    for (const definition of catalog.workerTypes) {
        const group = groupOf(workforce, definition.name);
        if (!group) {
            continue;
        }
        for (const task of definition.tasks) {
            const count = group.assignment[task] ?? 0;
            if (count <= 0) {
                continue;
            }

            const baseRate = getCollectionRate(ledger, task);
            const bonus = collectionRateBonus(buildings, definition.name, task);
            const amount = count * baseRate * typeModifier(definition.name, task) * (1 + bonus);
            addResource(ledger, task, amount);
            sink(task, amount);

            if (task === HUNTING_TASK) {
                const foodBonus = baseRate * HUNTING_FOOD_BONUS * count;
                addResource(ledger, FOOD, foodBonus);
                sink(FOOD, foodBonus);
            }
        }
    }
};

/**
 * One tick of work: gather, then feed everybody from the food pool.  A pool
 * that cannot cover upkeep is emptied; the shortfall has no further effect.
 */
export const collectAndTrack = (
    workforce: Workforce,
    ledger: ResourceLedger,
    buildings: BuildingRegistry,
    sink: GatherSink,
): UpkeepResult => {
    gatherResources(workforce, ledger, buildings, sink);
    const required = foodUpkeep(workforce);
    const paid = drainFood(ledger, required);
    return { required, paid };
};
