import type { BuildingRegistry } from './buildings';
import { buildingTick, createBuildingRegistry } from './buildings';
import { technologyDefinition } from './catalog';
import {
    KNOWLEDGE_TASK,
    RESEARCH_RATE_FRACTION,
    STARTING_AGE,
    STARTING_FOOD,
    STARTING_WOOD,
    STARTING_WORKERS,
    STARTING_WORKER_TYPE,
    FOOD,
} from './constants';
import { checkGameStateInvariants } from './invariants';
import { ageUnlocks, checkAdvancement } from './progression';
import type { ResearchState } from './research';
import { continueResearch, createResearchState } from './research';
import type { ResourceLedger } from './resources';
import { addResource, createResourceLedger, getResource } from './resources';
import type { GameStats } from './stats';
import { addAgeReached, addEvent, addResourceGathered, createStats } from './stats';
import type { Workforce } from './workforce';
import { addWorkers, collectAndTrack, createWorkforce } from './workforce';

export type Severity = 'info' | 'success' | 'warning' | 'error' | 'highlight';

/** Callbacks the simulation fires while it runs; the host decides where they go. */
export interface SimulationNotifier {
    message(text: string, severity: Severity): void;
    ageAdvanced(age: string): void;
}

export type SessionPhase = 'idle' | 'running' | 'stopped';

export interface GameState {
    tick: number;
    age: string;
    /** Epoch ms of the last processed tick batch. */
    lastUpdateTime: number;
    resources: ResourceLedger;
    buildings: BuildingRegistry;
    workforce: Workforce;
    research: ResearchState;
    stats: GameStats;
}

export type TickOptions = {
    tickIntervalMs: number;
    maxCatchUpTicks: number;
};

/** A fresh settlement: a little food and wood and one idle villager. */
export function createGameState(now: number = Date.now()): GameState {
    const state: GameState = {
        tick: 0,
        age: STARTING_AGE,
        lastUpdateTime: now,
        resources: createResourceLedger(),
        buildings: createBuildingRegistry(),
        workforce: createWorkforce(),
        research: createResearchState(),
        stats: createStats(STARTING_AGE, now),
    };
    addResource(state.resources, FOOD, STARTING_FOOD);
    addResource(state.resources, 'wood', STARTING_WOOD);
    addWorkers(state.workforce, STARTING_WORKER_TYPE, STARTING_WORKERS);
    return state;
}

/** Swap a fully built state into the live object in one synchronous step. */
export function replaceGameState(target: GameState, next: GameState): void {
    Object.assign(target, next);
}

function announceUnlocks(age: string, notifier: SimulationNotifier): void {
    const unlocks = ageUnlocks(age);
    const lines: [string, string[]][] = [
        ['buildings', unlocks.buildings],
        ['resources', unlocks.resources],
        ['worker types', unlocks.workerTypes],
    ];
    for (const [kind, names] of lines) {
        if (names.length > 0) {
            notifier.message(`New ${kind} available: ${names.join(', ')}`, 'info');
        }
    }
}

/**
 * One simulation step, always in this order: workers gather and eat,
 * buildings produce, research advances on a share of the knowledge stock,
 * then the settlement may enter the next age.
 */
export function advanceTick(state: GameState, notifier: SimulationNotifier, now: number = Date.now()): void {
    state.tick += 1;

    collectAndTrack(state.workforce, state.resources, state.buildings, (resource, amount) =>
        addResourceGathered(state.stats, resource, amount),
    );

    buildingTick(state.buildings, state.resources);

    const researchPoints = getResource(state.resources, KNOWLEDGE_TASK) * RESEARCH_RATE_FRACTION;
    const { completed } = continueResearch(state.research, researchPoints);
    if (completed !== null) {
        const title = technologyDefinition(completed)?.title ?? completed;
        notifier.message(`Research completed: ${title}`, 'success');
        addEvent(state.stats, state.tick, 'research_completed', `Completed research on ${completed}`, now);
    }

    const newAge = checkAdvancement(state.resources, state.buildings, state.age);
    if (newAge !== state.age) {
        state.age = newAge;
        notifier.ageAdvanced(newAge);
        announceUnlocks(newAge, notifier);
        addEvent(state.stats, state.tick, 'age_advancement', `Advanced to ${newAge}`, now);
        addAgeReached(state.stats, newAge);
    }

    const discrepancies = checkGameStateInvariants(state);
    if (discrepancies.length > 0) {
        console.warn(`[engine] Invariant check failed at tick ${state.tick}`, discrepancies);
    }
}

/**
 * How many ticks a batch should run: one per whole interval elapsed, capped
 * at `maxCatchUpTicks`, and never fewer than one.
 */
export const ticksDue = (elapsedMs: number, tickIntervalMs: number, maxCatchUpTicks: number): number => {
    if (!(tickIntervalMs > 0) || !Number.isFinite(elapsedMs)) {
        return 1;
    }
    const whole = Math.floor(Math.max(0, elapsedMs) / tickIntervalMs);
    return Math.max(1, Math.min(maxCatchUpTicks, whole));
};

/**
 * Catch the state up to `now`.  Returns the number of ticks processed.
 */
export function processElapsedTicks(
    state: GameState,
    now: number,
    options: TickOptions,
    notifier: SimulationNotifier,
): number {
    const count = ticksDue(now - state.lastUpdateTime, options.tickIntervalMs, options.maxCatchUpTicks);
    for (let i = 0; i < count; i++) {
        advanceTick(state, notifier, now);
    }
    state.lastUpdateTime = now;
    return count;
}
