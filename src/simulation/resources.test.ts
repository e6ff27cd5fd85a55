import { describe, it, expect, beforeEach } from 'vitest';

import {
    addResource,
    createResourceLedger,
    drainFood,
    getCollectionRate,
    getResource,
    hasResource,
    removeFood,
    removeResource,
    setCollectionRate,
    totalFood,
} from './resources';
import type { ResourceLedger } from './resources';

describe('resource ledger', () => {
    let ledger: ResourceLedger;

    beforeEach(() => {
        ledger = createResourceLedger();
    });

    it('starts every known resource at zero with its base rate', () => {
        expect(ledger.stocks).toEqual({ foraging: 0, wood: 0, stone: 0, gold: 0, knowledge: 0, hunting: 0 });
        expect(getCollectionRate(ledger, 'stone')).toBe(0.5);
        expect(getCollectionRate(ledger, 'hunting')).toBe(1.8);
    });

    it('rejects unknown names and negative amounts', () => {
        expect(addResource(ledger, 'iron', 5)).toBe(false);
        expect(addResource(ledger, 'wood', -1)).toBe(false);
        expect(removeResource(ledger, 'iron', 1)).toBe(false);
        expect(hasResource(ledger, 'iron', 0)).toBe(false);
        expect(getResource(ledger, 'iron')).toBe(0);
        expect(ledger.stocks.wood).toBe(0);
    });

    it('refuses a removal that would go negative and leaves the stock alone', () => {
        addResource(ledger, 'wood', 15);
        expect(removeResource(ledger, 'wood', 20)).toBe(false);
        expect(ledger.stocks.wood).toBe(15);
        expect(removeResource(ledger, 'wood', 15)).toBe(true);
        expect(ledger.stocks.wood).toBe(0);
    });

    it('credits food to the primary food source and reads food as the aggregate', () => {
        addResource(ledger, 'food', 12);
        addResource(ledger, 'hunting', 3);
        expect(ledger.stocks.foraging).toBe(12);
        expect(totalFood(ledger)).toBe(15);
        expect(getResource(ledger, 'food')).toBe(15);
        expect(hasResource(ledger, 'food', 15)).toBe(true);
        expect(hasResource(ledger, 'food', 15.5)).toBe(false);
    });

    it('removes food in proportion to each source', () => {
        ledger.stocks.foraging = 30;
        ledger.stocks.hunting = 10;

        expect(removeResource(ledger, 'food', 20)).toBe(true);

        expect(ledger.stocks.foraging).toBe(15);
        expect(ledger.stocks.hunting).toBe(5);
        expect(totalFood(ledger)).toBe(20);
    });

    it('drains exactly the requested amount from a single source', () => {
        ledger.stocks.foraging = 22;
        expect(removeFood(ledger, 5)).toBe(true);
        expect(ledger.stocks.foraging).toBe(17);
    });

    it('refuses to remove more food than the pool holds', () => {
        ledger.stocks.foraging = 3;
        expect(removeFood(ledger, 4)).toBe(false);
        expect(ledger.stocks.foraging).toBe(3);
    });

    it('treats a zero removal against a positive pool as a no-op success', () => {
        ledger.stocks.foraging = 3;
        expect(removeFood(ledger, 0)).toBe(true);
        expect(ledger.stocks.foraging).toBe(3);
    });

    it('drainFood empties the pool when upkeep exceeds it and reports what it took', () => {
        ledger.stocks.foraging = 3;
        ledger.stocks.hunting = 1;

        expect(drainFood(ledger, 10)).toBe(4);

        expect(ledger.stocks.foraging).toBe(0);
        expect(ledger.stocks.hunting).toBe(0);
    });

    it('never leaves a stock negative over a sequence of operations', () => {
        const ops: [string, string, number][] = [
            ['add', 'foraging', 7.3],
            ['remove', 'food', 2.2],
            ['add', 'hunting', 1.1],
            ['remove', 'food', 6.2],
            ['remove', 'food', 1],
            ['remove', 'wood', 1],
            ['add', 'wood', 0.4],
            ['remove', 'wood', 0.4],
        ];
        for (const [op, name, amount] of ops) {
            if (op === 'add') {
                addResource(ledger, name, amount);
            } else {
                removeResource(ledger, name, amount);
            }
            for (const value of Object.values(ledger.stocks)) {
                expect(value).toBeGreaterThanOrEqual(0);
            }
        }
    });

    it('only updates the rate of known resources', () => {
        expect(setCollectionRate(ledger, 'gold', 0.4)).toBe(true);
        expect(getCollectionRate(ledger, 'gold')).toBe(0.4);
        expect(setCollectionRate(ledger, 'iron', 1)).toBe(false);
        expect(getCollectionRate(ledger, 'iron')).toBe(0);
    });
});
