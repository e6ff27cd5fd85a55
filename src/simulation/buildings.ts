import { buildingDefinition, catalog } from './catalog';
import type { ResourceLedger } from './resources';
import { addResource, hasResource, removeResource } from './resources';

export type BuildingRegistry = {
    counts: Record<string, number>;
};

/** Housing available before any building is raised. */
export const BASE_VILLAGER_CAPACITY = 1;

export const createBuildingRegistry = (): BuildingRegistry => {
    const registry: BuildingRegistry = { counts: {} };
    for (const building of catalog.buildings) {
        registry.counts[building.name] = 0;
    }
    return registry;
};

export const isBuildingKnown = (name: string): boolean => buildingDefinition(name) !== undefined;

export const buildingCount = (registry: BuildingRegistry, name: string): number =>
    Object.hasOwn(registry.counts, name) ? registry.counts[name] : 0;

/** Cost lines of a building, or an empty record for unknown names. */
export const buildingCost = (name: string): Record<string, number> => buildingDefinition(name)?.cost ?? {};

export const canBuild = (registry: BuildingRegistry, name: string, ledger: ResourceLedger): boolean => {
    const definition = buildingDefinition(name);
    if (!definition || !Object.hasOwn(registry.counts, name)) {
        return false;
    }
    return Object.entries(definition.cost).every(([resource, amount]) => hasResource(ledger, resource, amount));
};

/**
 * Raise one building.  Either every cost line is paid and the count goes up
 * by one, or nothing changes.
 */
export const build = (registry: BuildingRegistry, name: string, ledger: ResourceLedger): boolean => {
    if (!canBuild(registry, name, ledger)) {
        return false;
    }
    for (const [resource, amount] of Object.entries(buildingCost(name))) {
        removeResource(ledger, resource, amount);
    }
    registry.counts[name] += 1;
    return true;
};

/** Passive production of every standing building, scaled by count. */
export const buildingTick = (registry: BuildingRegistry, ledger: ResourceLedger): void => {
    for (const building of catalog.buildings) {
        const count = buildingCount(registry, building.name);
        if (count <= 0) {
            continue;
        }
        for (const [resource, amount] of Object.entries(building.production)) {
            addResource(ledger, resource, amount * count);
        }
    }
};

export const villagerCapacity = (registry: BuildingRegistry): number => {
    let capacity = BASE_VILLAGER_CAPACITY;
    for (const building of catalog.buildings) {
        const count = buildingCount(registry, building.name);
        if (count > 0 && building.villagerCapacity > 0) {
            capacity += Math.floor(building.villagerCapacity * count);
        }
    }
    return capacity;
};

/**
 * Additive gathering bonus for one worker type on one resource: the sum of
 * every building's bonus for that pair, times how many of it stand.
 */
export const collectionRateBonus = (registry: BuildingRegistry, workerType: string, resource: string): number => {
    let bonus = 0;
    for (const building of catalog.buildings) {
        const count = buildingCount(registry, building.name);
        const perBuilding = building.rateBonuses[workerType]?.[resource];
        if (count > 0 && perBuilding !== undefined) {
            bonus += perBuilding * count;
        }
    }
    return bonus;
};
