import { IDLE_TASK } from './constants';
import type { GameState } from './engine';
import type { ResourceLedger } from './resources';
import type { Workforce } from './workforce';

/**
 * Every worker type's assignments (idle included) must add up to its count,
 * and no bucket may be negative or fractional.
 */
export function checkWorkforceConsistency(workforce: Workforce): string[] {
    const discrepancies: string[] = [];
    for (const [workerType, group] of Object.entries(workforce)) {
        let assigned = 0;
        for (const [task, count] of Object.entries(group.assignment)) {
            if (!Number.isInteger(count) || count < 0) {
                discrepancies.push(`${workerType}: assignment '${task}' holds ${count}`);
            }
            assigned += count;
        }
        if (assigned !== group.count) {
            discrepancies.push(
                `${workerType}: count=${group.count} but assignments sum to ${assigned} (idle=${group.assignment[IDLE_TASK] ?? 0})`,
            );
        }
    }
    return discrepancies;
}

export function checkResourcesNonNegative(ledger: ResourceLedger): string[] {
    return Object.entries(ledger.stocks)
        .filter(([, amount]) => !(amount >= 0))
        .map(([resource, amount]) => `resource '${resource}' is ${amount}`);
}

/**
 * Run the consistency checks over a whole state.  With `strict` (on when
 * SIM_DEBUG=1) the first failing state throws with every discrepancy found;
 * otherwise the discrepancies are returned.
 */
export function checkGameStateInvariants(state: GameState, strict = process.env.SIM_DEBUG === '1'): string[] {
    const discrepancies = [...checkWorkforceConsistency(state.workforce), ...checkResourcesNonNegative(state.resources)];
    for (const [building, count] of Object.entries(state.buildings.counts)) {
        if (!Number.isInteger(count) || count < 0) {
            discrepancies.push(`building '${building}' count is ${count}`);
        }
    }

    if (discrepancies.length && strict) {
        throw new Error(`Game state invariant check failed at tick ${state.tick}:\n` + discrepancies.join('\n'));
    }
    return discrepancies;
}
