/**
 * resources.ts
 *
 * The resource ledger: one non-negative stock per known resource plus the
 * base rate at which a single worker gathers it.
 *
 * `food` is virtual.  Crediting food goes to the primary food source;
 * checking or spending food works against the sum of every food-source stock,
 * and a spend drains each source in proportion to its share of that sum.
 */

import { catalog, foodSources } from './catalog';
import { FOOD, FOOD_EPSILON } from './constants';

export type ResourceLedger = {
    stocks: Record<string, number>;
    collectionRates: Record<string, number>;
};

export const createResourceLedger = (): ResourceLedger => {
    const ledger: ResourceLedger = { stocks: {}, collectionRates: {} };
    for (const resource of catalog.resources) {
        ledger.stocks[resource.name] = 0;
        ledger.collectionRates[resource.name] = resource.baseRate;
    }
    return ledger;
};

const isKnown = (ledger: ResourceLedger, name: string): boolean => Object.hasOwn(ledger.stocks, name);

const isValidAmount = (amount: number): boolean => Number.isFinite(amount) && amount >= 0;

export const totalFood = (ledger: ResourceLedger): number => {
    let total = 0;
    for (const source of foodSources) {
        total += ledger.stocks[source] ?? 0;
    }
    return total;
};

export const hasFood = (ledger: ResourceLedger, amount: number): boolean => totalFood(ledger) >= amount;

/**
 * Remove `amount` from the food pool, split across the food sources by their
 * share of the pre-removal total.  Returns false (and changes nothing) when
 * the pool cannot cover it.
 */
export const removeFood = (ledger: ResourceLedger, amount: number): boolean => {
    if (!isValidAmount(amount) || !hasFood(ledger, amount)) {
        return false;
    }

    const total = totalFood(ledger);
    if (total <= 0 || amount <= 0) {
        return true;
    }

    for (const source of foodSources) {
        const current = ledger.stocks[source] ?? 0;
        if (current <= 0) {
            continue;
        }
        const remaining = current - amount * (current / total);
        ledger.stocks[source] = remaining < FOOD_EPSILON ? 0 : remaining;
    }
    return true;
};

/**
 * Remove as much of `amount` as the food pool holds.  Returns what was
 * actually removed; the shortfall is `amount` minus that.
 */
export const drainFood = (ledger: ResourceLedger, amount: number): number => {
    if (!isValidAmount(amount)) {
        return 0;
    }
    const removable = Math.min(amount, totalFood(ledger));
    removeFood(ledger, removable);
    return removable;
};

export const addResource = (ledger: ResourceLedger, name: string, amount: number): boolean => {
    if (!isValidAmount(amount)) {
        return false;
    }
    const target = name === FOOD ? catalog.primaryFoodSource : name;
    if (!isKnown(ledger, target)) {
        return false;
    }
    ledger.stocks[target] += amount;
    return true;
};

export const removeResource = (ledger: ResourceLedger, name: string, amount: number): boolean => {
    if (name === FOOD) {
        return removeFood(ledger, amount);
    }
    if (!isValidAmount(amount) || !isKnown(ledger, name) || ledger.stocks[name] < amount) {
        return false;
    }
    ledger.stocks[name] -= amount;
    return true;
};

export const hasResource = (ledger: ResourceLedger, name: string, amount: number): boolean => {
    if (name === FOOD) {
        return hasFood(ledger, amount);
    }
    return isKnown(ledger, name) && ledger.stocks[name] >= amount;
};

/** Current stock; `food` reads the aggregate and unknown names read 0. */
export const getResource = (ledger: ResourceLedger, name: string): number => {
    if (name === FOOD) {
        return totalFood(ledger);
    }
    return isKnown(ledger, name) ? ledger.stocks[name] : 0;
};

export const getCollectionRate = (ledger: ResourceLedger, name: string): number =>
    Object.hasOwn(ledger.collectionRates, name) ? ledger.collectionRates[name] : 0;

export const setCollectionRate = (ledger: ResourceLedger, name: string, rate: number): boolean => {
    if (!Object.hasOwn(ledger.collectionRates, name) || !isValidAmount(rate)) {
        return false;
    }
    ledger.collectionRates[name] = rate;
    return true;
};
