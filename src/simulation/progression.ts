import type { AgeDefinition } from './catalog';
import { ageDefinition, ageNames, catalog } from './catalog';
import type { BuildingRegistry } from './buildings';
import { buildingCount } from './buildings';
import type { ResourceLedger } from './resources';
import { getResource } from './resources';

export type RequirementProgress = {
    name: string;
    required: number;
    current: number;
};

export type AdvancementProgress = {
    age: string;
    resources: RequirementProgress[];
    buildings: RequirementProgress[];
};

/** Position of an age in the ladder; unknown names count as the first age. */
export const ageIndex = (age: string): number => Math.max(0, ageNames.indexOf(age));

export const nextAge = (age: string): string | null => ageNames[ageIndex(age) + 1] ?? null;

export const isKnownAge = (age: string): boolean => ageNames.includes(age);

export const ageRequirements = (age: string): AgeDefinition['requirements'] =>
    ageDefinition(age)?.requirements ?? { resources: {}, buildings: {} };

export const ageUnlocks = (age: string): AgeDefinition['unlocks'] =>
    ageDefinition(age)?.unlocks ?? { buildings: [], resources: [], workerTypes: [] };

/** Ages from the first one up to and including `age`. */
const agesThrough = (age: string): AgeDefinition[] => catalog.ages.slice(0, ageIndex(age) + 1);

export const unlockedBuildings = (age: string): string[] => agesThrough(age).flatMap((a) => a.unlocks.buildings);

export const unlockedWorkerTypes = (age: string): string[] => [
    ...catalog.workerTypes.filter((w) => w.availableFromStart).map((w) => w.name),
    ...agesThrough(age).flatMap((a) => a.unlocks.workerTypes),
];

/**
 * Where the settlement stands against the next age's thresholds, or null at
 * the end of the ladder.
 */
export const advancementProgress = (
    ledger: ResourceLedger,
    buildings: BuildingRegistry,
    age: string,
): AdvancementProgress | null => {
    const next = nextAge(age);
    if (next === null) {
        return null;
    }
    const requirements = ageRequirements(next);
    return {
        age: next,
        resources: Object.entries(requirements.resources).map(([name, required]) => ({
            name,
            required,
            current: getResource(ledger, name),
        })),
        buildings: Object.entries(requirements.buildings).map(([name, required]) => ({
            name,
            required,
            current: buildingCount(buildings, name),
        })),
    };
};

/**
 * The age the settlement qualifies for: the next one when every resource and
 * building threshold is met, otherwise `currentAge`.  Never mutates; the
 * caller commits the change.
 */
export const checkAdvancement = (ledger: ResourceLedger, buildings: BuildingRegistry, currentAge: string): string => {
    const progress = advancementProgress(ledger, buildings, currentAge);
    if (!progress) {
        return currentAge;
    }
    const met = [...progress.resources, ...progress.buildings].every((r) => r.current >= r.required);
    return met ? progress.age : currentAge;
};
