import { describe, it, expect } from 'vitest';

import { MAX_STORED_EVENTS } from './constants';
import {
    addAgeReached,
    addBuildingBuilt,
    addEvent,
    addResourceGathered,
    addVillagersRecruited,
    createStats,
    playTime,
    recentEvents,
    totalBuildingsBuilt,
    totalResourcesGathered,
    totalVillagersRecruited,
} from './stats';

describe('game statistics', () => {
    it('accumulates counters and totals', () => {
        const stats = createStats('Stone Age', 0);
        addResourceGathered(stats, 'wood', 1.5);
        addResourceGathered(stats, 'wood', 2);
        addResourceGathered(stats, 'stone', 0.5);
        addBuildingBuilt(stats, 'hut');
        addBuildingBuilt(stats, 'hut');
        addVillagersRecruited(stats, 'villager', 3);

        expect(stats.resourcesGathered).toEqual({ wood: 3.5, stone: 0.5 });
        expect(totalResourcesGathered(stats)).toBe(4);
        expect(totalBuildingsBuilt(stats)).toBe(2);
        expect(totalVillagersRecruited(stats)).toBe(3);
    });

    it('records each age once', () => {
        const stats = createStats('Stone Age', 0);
        addAgeReached(stats, 'Bronze Age');
        addAgeReached(stats, 'Bronze Age');
        expect(stats.agesReached).toEqual(['Stone Age', 'Bronze Age']);
    });

    it('keeps only the newest events once the log is full', () => {
        const stats = createStats('Stone Age', 0);
        for (let tick = 1; tick <= MAX_STORED_EVENTS + 5; tick++) {
            addEvent(stats, tick, 'building_built', `event ${tick}`, 0);
        }
        expect(stats.events).toHaveLength(MAX_STORED_EVENTS);
        expect(stats.events[0].tick).toBe(6);
        expect(recentEvents(stats, 2).map((e) => e.message)).toEqual([
            `event ${MAX_STORED_EVENTS + 4}`,
            `event ${MAX_STORED_EVENTS + 5}`,
        ]);
        expect(recentEvents(stats, 0)).toEqual([]);
    });

    it('formats play time as hours and minutes', () => {
        const stats = createStats('Stone Age', 0);
        expect(playTime(stats, 0)).toBe('0h 0m');
        expect(playTime(stats, (2 * 60 + 5) * 60_000 + 59_000)).toBe('2h 5m');
    });
});
