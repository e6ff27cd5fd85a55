/**
 * cli/display.ts
 *
 * The display capability the front end hands its snapshots and messages to.
 * TerminalDisplay redraws the whole dashboard on every push; once released
 * it ignores everything.
 */

import type { CommandMessage } from '../simulation/commands';
import type { Severity } from '../simulation/engine';
import type { StateSnapshot } from '../simulation/snapshot';
import { renderDashboard } from './dashboard';

export interface Display {
    push(snapshot: StateSnapshot): void;
    showMessage(text: string, severity: Severity): void;
    showAgeAdvancement(age: string): void;
    release(): void;
}

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const MAX_LOG = 200;

export type TerminalDisplayOptions = {
    output: NodeJS.WritableStream;
    /** Clear the screen before each redraw. */
    clear?: boolean;
    /** Called after each redraw, e.g. to put the prompt back. */
    onRedraw?: () => void;
};

export class TerminalDisplay implements Display {
    private readonly log: CommandMessage[] = [];
    private last: StateSnapshot | null = null;
    private released = false;

    constructor(private readonly options: TerminalDisplayOptions) {}

    messages(): readonly CommandMessage[] {
        return this.log;
    }

    push(snapshot: StateSnapshot): void {
        if (this.released) {
            return;
        }
        this.last = snapshot;
        this.redraw();
    }

    showMessage(text: string, severity: Severity): void {
        if (this.released) {
            return;
        }
        this.log.push({ text, severity });
        if (this.log.length > MAX_LOG) {
            this.log.splice(0, this.log.length - MAX_LOG);
        }
    }

    showAgeAdvancement(age: string): void {
        this.showMessage(`*** Your settlement has advanced to the ${age}! ***`, 'highlight');
        if (this.last) {
            this.redraw();
        }
    }

    release(): void {
        if (this.released) {
            return;
        }
        this.released = true;
        this.options.output.write('\n');
    }

    private redraw(): void {
        if (!this.last || this.released) {
            return;
        }
        const body = renderDashboard(this.last, this.log).join('\n');
        this.options.output.write(`${this.options.clear ? CLEAR_SCREEN : ''}${body}\n\n`);
        this.options.onRedraw?.();
    }
}
