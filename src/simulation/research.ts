/**
 * research.ts
 *
 * One research slot at a time.  Progress accumulates from the points fed in
 * each tick; once it reaches the technology's cost the technology is
 * researched for good and the slot empties.
 */

import type { TechnologyDefinition } from './catalog';
import { ALL_RESOURCES, catalog, foodSources, technologyDefinition } from './catalog';
import { FOOD } from './constants';
import { ageIndex } from './progression';

export type ResearchState = {
    current: string | null;
    progress: number;
    researched: string[];
};

export type ResearchProgress = {
    current: string | null;
    progress: number;
    cost: number;
};

export type ResearchStep = {
    completed: string | null;
};

export const createResearchState = (): ResearchState => ({ current: null, progress: 0, researched: [] });

export const isResearched = (state: ResearchState, name: string): boolean => state.researched.includes(name);

const prerequisitesMet = (state: ResearchState, technology: TechnologyDefinition): boolean =>
    technology.prerequisites.every((p) => isResearched(state, p));

/**
 * Put a technology in the slot with `carryOver` points already banked.
 * Fails for unknown or finished technologies, unmet prerequisites, or when
 * something else is being researched.
 */
export const startResearch = (state: ResearchState, name: string, carryOver = 0): boolean => {
    const technology = technologyDefinition(name);
    if (!technology || isResearched(state, name) || !prerequisitesMet(state, technology)) {
        return false;
    }
    if (state.current !== null || !Number.isFinite(carryOver) || carryOver < 0) {
        return false;
    }
    state.current = name;
    state.progress = carryOver;
    return true;
};

export const continueResearch = (state: ResearchState, points: number): ResearchStep => {
    if (state.current === null) {
        return { completed: null };
    }
    const technology = technologyDefinition(state.current);
    if (!technology) {
        state.current = null;
        state.progress = 0;
        return { completed: null };
    }

    state.progress += Number.isFinite(points) && points > 0 ? points : 0;
    if (state.progress < technology.cost) {
        return { completed: null };
    }

    state.researched.push(technology.name);
    state.current = null;
    state.progress = 0;
    return { completed: technology.name };
};

export const researchProgress = (state: ResearchState): ResearchProgress => {
    const technology = state.current === null ? undefined : technologyDefinition(state.current);
    if (!technology) {
        return { current: null, progress: 0, cost: 0 };
    }
    return { current: technology.name, progress: state.progress, cost: technology.cost };
};

/** Technologies from the current or an earlier age whose prerequisites are all done. */
export const availableTechnologies = (state: ResearchState, currentAge: string): TechnologyDefinition[] => {
    const current = ageIndex(currentAge);
    return catalog.technologies.filter(
        (t) => ageIndex(t.age) <= current && !isResearched(state, t.name) && prerequisitesMet(state, t),
    );
};

export const researchedTechnologies = (state: ResearchState): TechnologyDefinition[] =>
    catalog.technologies.filter((t) => isResearched(state, t.name));

/**
 * Collection rates after research bonuses.  Bonuses on every resource are
 * summed and applied first; resource-specific bonuses then multiply on top,
 * with a `food` bonus covering each food source.
 */
export const applyResearchBonuses = (rates: Record<string, number>, state: ResearchState): Record<string, number> => {
    const result: Record<string, number> = { ...rates };
    const effects = researchedTechnologies(state).flatMap((t) => t.effects);

    const globalBonus = effects.filter((e) => e.resource === ALL_RESOURCES).reduce((sum, e) => sum + e.bonus, 0);
    if (globalBonus > 0) {
        for (const resource of Object.keys(result)) {
            result[resource] *= 1 + globalBonus;
        }
    }

    for (const effect of effects) {
        if (effect.resource === ALL_RESOURCES) {
            continue;
        }
        const targets = effect.resource === FOOD ? foodSources : [effect.resource];
        for (const resource of targets) {
            if (Object.hasOwn(result, resource)) {
                result[resource] *= 1 + effect.bonus;
            }
        }
    }
    return result;
};
