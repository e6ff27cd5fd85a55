import { MAX_STORED_EVENTS } from './constants';

export const GAME_EVENT_TYPES = [
    'building_built',
    'villager_recruited',
    'research_started',
    'research_completed',
    'age_advancement',
] as const;
export type GameEventType = (typeof GAME_EVENT_TYPES)[number];

export type GameEvent = {
    tick: number;
    timestamp: string; // ISO-8601
    eventType: GameEventType;
    message: string;
};

export type GameStats = {
    events: GameEvent[];
    resourcesGathered: Record<string, number>;
    buildingsBuilt: Record<string, number>;
    villagersRecruited: Record<string, number>;
    agesReached: string[];
    startTime: string; // ISO-8601
};

export const createStats = (startAge: string, now: number = Date.now()): GameStats => ({
    events: [],
    resourcesGathered: {},
    buildingsBuilt: {},
    villagersRecruited: {},
    agesReached: [startAge],
    startTime: new Date(now).toISOString(),
});

export const addEvent = (
    stats: GameStats,
    tick: number,
    eventType: GameEventType,
    message: string,
    now: number = Date.now(),
): void => {
    stats.events.push({ tick, timestamp: new Date(now).toISOString(), eventType, message });
    if (stats.events.length > MAX_STORED_EVENTS) {
        stats.events.splice(0, stats.events.length - MAX_STORED_EVENTS);
    }
};

export const addResourceGathered = (stats: GameStats, resource: string, amount: number): void => {
    stats.resourcesGathered[resource] = (stats.resourcesGathered[resource] ?? 0) + amount;
};

export const addBuildingBuilt = (stats: GameStats, building: string): void => {
    stats.buildingsBuilt[building] = (stats.buildingsBuilt[building] ?? 0) + 1;
};

export const addVillagersRecruited = (stats: GameStats, workerType: string, count: number): void => {
    stats.villagersRecruited[workerType] = (stats.villagersRecruited[workerType] ?? 0) + count;
};

export const addAgeReached = (stats: GameStats, age: string): void => {
    if (!stats.agesReached.includes(age)) {
        stats.agesReached.push(age);
    }
};

const sumValues = (record: Record<string, number>): number => Object.values(record).reduce((s, v) => s + v, 0);

export const totalResourcesGathered = (stats: GameStats): number => sumValues(stats.resourcesGathered);
export const totalBuildingsBuilt = (stats: GameStats): number => sumValues(stats.buildingsBuilt);
export const totalVillagersRecruited = (stats: GameStats): number => sumValues(stats.villagersRecruited);

export const recentEvents = (stats: GameStats, limit: number): GameEvent[] =>
    limit > 0 ? stats.events.slice(-limit) : [];

/** Wall-clock time since the session started, as "<h>h <m>m". */
export const playTime = (stats: GameStats, now: number = Date.now()): string => {
    const started = Date.parse(stats.startTime);
    const elapsedMinutes = Number.isNaN(started) ? 0 : Math.max(0, Math.floor((now - started) / 60_000));
    return `${Math.floor(elapsedMinutes / 60)}h ${elapsedMinutes % 60}m`;
};
