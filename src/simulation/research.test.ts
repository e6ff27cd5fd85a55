import { describe, it, expect, beforeEach } from 'vitest';

import {
    applyResearchBonuses,
    availableTechnologies,
    continueResearch,
    createResearchState,
    isResearched,
    researchProgress,
    startResearch,
} from './research';
import type { ResearchState } from './research';
import { createResourceLedger } from './resources';

describe('research board', () => {
    let state: ResearchState;

    beforeEach(() => {
        state = createResearchState();
    });

    it('completes a 40-point technology on the second 25-point step', () => {
        expect(startResearch(state, 'writing')).toBe(true);

        expect(continueResearch(state, 25)).toEqual({ completed: null });
        expect(researchProgress(state)).toEqual({ current: 'writing', progress: 25, cost: 40 });

        expect(continueResearch(state, 25)).toEqual({ completed: 'writing' });
        expect(state.current).toBeNull();
        expect(state.progress).toBe(0);
        expect(isResearched(state, 'writing')).toBe(true);
    });

    it('cannot restart a finished technology', () => {
        startResearch(state, 'agriculture');
        continueResearch(state, 20);
        expect(startResearch(state, 'agriculture')).toBe(false);
    });

    it('holds one technology at a time', () => {
        expect(startResearch(state, 'agriculture')).toBe(true);
        expect(startResearch(state, 'toolmaking')).toBe(false);
        expect(state.current).toBe('agriculture');
    });

    it('requires prerequisites and known names', () => {
        expect(startResearch(state, 'mathematics')).toBe(false);
        expect(startResearch(state, 'alchemy')).toBe(false);
        state.researched.push('writing');
        expect(startResearch(state, 'mathematics')).toBe(true);
    });

    it('banks carried-over progress', () => {
        expect(startResearch(state, 'toolmaking', 10)).toBe(true);
        expect(continueResearch(state, 14)).toEqual({ completed: null });
        expect(continueResearch(state, 1)).toEqual({ completed: 'toolmaking' });
    });

    it('does nothing without a technology in the slot', () => {
        expect(continueResearch(state, 100)).toEqual({ completed: null });
        expect(state.researched).toEqual([]);
    });

    it('offers technologies of the current and earlier ages whose prerequisites are done', () => {
        expect(availableTechnologies(state, 'Stone Age').map((t) => t.name)).toEqual(['agriculture', 'toolmaking']);
        expect(availableTechnologies(state, 'Iron Age').map((t) => t.name)).toEqual([
            'agriculture',
            'toolmaking',
            'writing',
            'metallurgy',
        ]);
        state.researched.push('writing', 'agriculture');
        expect(availableTechnologies(state, 'Iron Age').map((t) => t.name)).toEqual([
            'toolmaking',
            'metallurgy',
            'mathematics',
        ]);
    });

    it('applies global bonuses first and specific ones on top', () => {
        const rates = createResourceLedger().collectionRates;
        state.researched.push('toolmaking', 'agriculture');

        const effective = applyResearchBonuses(rates, state);

        expect(effective.wood).toBeCloseTo(1.1, 10);
        expect(effective.foraging).toBeCloseTo(1.32, 10);
        expect(effective.hunting).toBeCloseTo(1.8 * 1.1 * 1.2, 10);
        expect(rates.wood).toBe(1);
    });
});
