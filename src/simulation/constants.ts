export const FOOD = 'food';
export const IDLE_TASK = 'idle';
export const KNOWLEDGE_TASK = 'knowledge';
export const HUNTING_TASK = 'hunting';

/** Share of the base hunting rate that also lands in the food pool, per hunter. */
export const HUNTING_FOOD_BONUS = 0.4;

/** Fraction of the knowledge stock fed into the active research each tick. */
export const RESEARCH_RATE_FRACTION = 0.1;

/** Food-source stocks below this after a proportional removal are snapped to zero. */
export const FOOD_EPSILON = 0.00001;

export const DEFAULT_TICK_INTERVAL_MS = 1000;
export const DEFAULT_MAX_CATCH_UP_TICKS = 100;

/** Oldest events are dropped once the log grows past this. */
export const MAX_STORED_EVENTS = 500;

export const STARTING_AGE = 'Stone Age';
export const STARTING_FOOD = 20;
export const STARTING_WOOD = 15;
export const STARTING_WORKER_TYPE = 'villager';
export const STARTING_WORKERS = 1;
