import { describe, it, expect } from 'vitest';

import { advanceTick, createGameState, processElapsedTicks, ticksDue } from './engine';
import type { Severity, SimulationNotifier } from './engine';
import { totalFood } from './resources';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function recordingNotifier() {
    const messages: [string, Severity][] = [];
    const ages: string[] = [];
    const notifier: SimulationNotifier = {
        message: (text, severity) => {
            messages.push([text, severity]);
        },
        ageAdvanced: (age) => {
            ages.push(age);
        },
    };
    return { messages, ages, notifier };
}

const OPTIONS = { tickIntervalMs: 1000, maxCatchUpTicks: 100 };

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('createGameState', () => {
    it('seeds a fresh Stone Age settlement', () => {
        const state = createGameState(1_000);

        expect(state.tick).toBe(0);
        expect(state.age).toBe('Stone Age');
        expect(state.lastUpdateTime).toBe(1_000);
        expect(state.resources.stocks.foraging).toBe(20);
        expect(state.resources.stocks.wood).toBe(15);
        expect(state.workforce.villager).toMatchObject({ count: 1, assignment: { idle: 1 } });
        expect(state.stats.agesReached).toEqual(['Stone Age']);
        expect(state.stats.startTime).toBe(new Date(1_000).toISOString());
    });
});

describe('advanceTick', () => {
    it('increments the tick and feeds the idle villager', () => {
        const state = createGameState(0);
        const { notifier, messages } = recordingNotifier();

        advanceTick(state, notifier, 0);

        expect(state.tick).toBe(1);
        expect(state.resources.stocks.foraging).toBe(19.5);
        expect(messages).toEqual([]);
    });

    it('tracks gathered amounts in the statistics', () => {
        const state = createGameState(0);
        state.workforce.villager.assignment = { ...state.workforce.villager.assignment, idle: 0, wood: 1 };

        advanceTick(state, recordingNotifier().notifier, 0);

        expect(state.resources.stocks.wood).toBe(16);
        expect(state.stats.resourcesGathered).toEqual({ wood: 1 });
    });

    it('feeds research a tenth of the knowledge stock and announces completion', () => {
        const state = createGameState(0);
        const { notifier, messages } = recordingNotifier();
        state.resources.stocks.knowledge = 10;
        state.research.current = 'agriculture';
        state.research.progress = 19.5;

        advanceTick(state, notifier, 0);

        expect(state.research.researched).toEqual(['agriculture']);
        expect(state.research.current).toBeNull();
        expect(state.resources.stocks.knowledge).toBe(10);
        expect(messages).toEqual([['Research completed: Agriculture', 'success']]);
        expect(state.stats.events.at(-1)).toMatchObject({
            tick: 1,
            eventType: 'research_completed',
            message: 'Completed research on agriculture',
        });
    });

    it('enters the next age once the thresholds are met', () => {
        const state = createGameState(0);
        const { notifier, ages, messages } = recordingNotifier();
        state.resources.stocks.stone = 50;
        state.resources.stocks.foraging = 100;
        state.buildings.counts.hut = 3;
        state.buildings.counts.farm = 2;

        advanceTick(state, notifier, 0);

        expect(state.age).toBe('Bronze Age');
        expect(ages).toEqual(['Bronze Age']);
        expect(messages).toEqual([
            ['New buildings available: lumber_mill, mine', 'info'],
            ['New resources available: stone', 'info'],
        ]);
        expect(state.stats.agesReached).toEqual(['Stone Age', 'Bronze Age']);
        expect(state.stats.events.at(-1)).toMatchObject({ eventType: 'age_advancement', message: 'Advanced to Bronze Age' });

        advanceTick(state, notifier, 0);
        expect(ages).toEqual(['Bronze Age']);
    });
});

describe('ticksDue', () => {
    it('runs one tick per whole interval elapsed', () => {
        expect(ticksDue(2_500, 1_000, 100)).toBe(2);
        expect(ticksDue(3_000, 1_000, 100)).toBe(3);
    });

    it('always runs at least one tick', () => {
        expect(ticksDue(0, 1_000, 100)).toBe(1);
        expect(ticksDue(999, 1_000, 100)).toBe(1);
        expect(ticksDue(-5_000, 1_000, 100)).toBe(1);
        expect(ticksDue(Number.NaN, 1_000, 100)).toBe(1);
        expect(ticksDue(5_000, 0, 100)).toBe(1);
    });

    it('caps a long absence at the catch-up limit', () => {
        expect(ticksDue(86_400_000, 1_000, 100)).toBe(100);
    });
});

describe('processElapsedTicks', () => {
    it('catches up whole intervals and records the update time', () => {
        const state = createGameState(0);

        const processed = processElapsedTicks(state, 3_500, OPTIONS, recordingNotifier().notifier);

        expect(processed).toBe(3);
        expect(state.tick).toBe(3);
        expect(state.lastUpdateTime).toBe(3_500);
        expect(state.resources.stocks.foraging).toBe(18.5);
    });

    it('stops at the cap and never lets food go negative', () => {
        const state = createGameState(0);

        const processed = processElapsedTicks(state, 10_000_000, OPTIONS, recordingNotifier().notifier);

        expect(processed).toBe(100);
        expect(state.tick).toBe(100);
        expect(totalFood(state.resources)).toBe(0);
    });
});
