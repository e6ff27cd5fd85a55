import { resourceDefinition } from '../simulation/catalog';
import type { CommandMessage } from '../simulation/commands';
import { formatAmount } from '../simulation/commands';
import type { RequirementProgress } from '../simulation/progression';
import type { StateSnapshot } from '../simulation/snapshot';

export const MESSAGE_LOG_LINES = 12;

const requirementLine = (r: RequirementProgress): string =>
    `  [${r.current >= r.required ? 'x' : ' '}] ${r.name} ${formatAmount(r.current)}/${formatAmount(r.required)}`;

/**
 * Plain-text dashboard for one snapshot plus the tail of the message log.
 * Returns lines without colour codes.
 */
export function renderDashboard(snapshot: StateSnapshot, messages: readonly CommandMessage[]): string[] {
    const lines: string[] = [];
    lines.push(`${snapshot.age} | Tick ${snapshot.tick}`);

    lines.push('', 'Resources');
    lines.push(`  Food supply: ${formatAmount(snapshot.totalFood)} (upkeep ${formatAmount(snapshot.foodUpkeep)}/tick)`);
    for (const [name, amount] of Object.entries(snapshot.resources)) {
        const rate = snapshot.effectiveRates[name] ?? 0;
        const label = resourceDefinition(name)?.label ?? name;
        lines.push(`  ${label}: ${formatAmount(amount)} @ ${rate.toFixed(2)}`);
    }

    const population = Object.values(snapshot.workforce).reduce((sum, g) => sum + g.count, 0);
    lines.push('', 'Workers', `  Population: ${population}/${snapshot.villagerCapacity}`);
    for (const [workerType, group] of Object.entries(snapshot.workforce)) {
        if (group.count === 0) {
            continue;
        }
        const jobs = Object.entries(group.assignment)
            .filter(([, n]) => n > 0)
            .map(([task, n]) => `${task} ${n}`)
            .join(', ');
        lines.push(`  ${workerType}: ${group.count} (${jobs})`);
    }

    lines.push('', 'Buildings');
    const standing = Object.entries(snapshot.buildings).filter(([, n]) => n > 0);
    if (standing.length === 0) {
        lines.push('  none');
    }
    for (const [name, count] of standing) {
        lines.push(`  ${name}: ${count}`);
    }

    lines.push('', 'Research');
    const { research } = snapshot;
    lines.push(
        research.current === null
            ? '  idle'
            : `  ${research.current}: ${research.progress.toFixed(1)} / ${research.cost.toFixed(1)}`,
    );
    if (research.researched.length > 0) {
        lines.push(`  Researched: ${research.researched.join(', ')}`);
    }

    lines.push('', 'Next age');
    if (snapshot.nextAge === null) {
        lines.push('  Final age reached');
    } else {
        lines.push(`  ${snapshot.nextAge.age}`);
        lines.push(...snapshot.nextAge.resources.map(requirementLine));
        lines.push(...snapshot.nextAge.buildings.map(requirementLine));
    }

    lines.push('', 'Messages');
    for (const message of messages.slice(-MESSAGE_LOG_LINES)) {
        lines.push(`  ${message.text}`);
    }
    return lines;
}
