/**
 * simulation/host.ts
 *
 * The session that owns the one live GameState.  Everything that touches
 * the state goes through here:
 *   - the tick loop (recursive setTimeout, so batches never overlap),
 *   - commands, queued and handled one at a time,
 *   - snapshot reads.
 *
 * The host knows nothing about threads; it talks through a `post` callback.
 * worker.ts wires it to parentPort.
 */

import type { CommandResult, SaveStore } from './commands';
import { executeCommand } from './commands';
import type { GameState, SessionPhase, Severity, SimulationNotifier, TickOptions } from './engine';
import { createGameState, processElapsedTicks } from './engine';
import type { StateSnapshot } from './snapshot';
import { toStateSnapshot } from './snapshot';

export type InboundMessage =
    | { type: 'ping' }
    | { type: 'command'; requestId: number; line: string }
    | { type: 'snapshot'; requestId: number }
    | { type: 'shutdown' };

export type OutboundMessage =
    | { type: 'pong'; tick: number; phase: SessionPhase }
    | { type: 'tick'; tick: number; processed: number; elapsedMs: number }
    | { type: 'reply'; requestId: number; result: CommandResult }
    | { type: 'state'; requestId: number; snapshot: StateSnapshot }
    | { type: 'message'; text: string; severity: Severity }
    | { type: 'ageAdvanced'; age: string }
    // Sent by the manager when it had to replace a worker that died.
    | { type: 'workerRestarted'; reason?: string };

export type HostOptions = TickOptions & {
    saveStore: SaveStore;
    debug?: boolean;
    clock?: () => number;
};

export interface SimulationHost {
    readonly state: GameState;
    phase(): SessionPhase;
    /** idle -> running: seed a fresh settlement and start ticking. */
    start(): void;
    /** Stop ticking for good.  A batch already running finishes first. */
    stop(): void;
    handle(msg: InboundMessage): void;
    /** Resolves once every queued command has been handled. */
    drain(): Promise<void>;
}

export function createSimulationHost(options: HostOptions, post: (msg: OutboundMessage) => void): SimulationHost {
    const clock = options.clock ?? Date.now;
    const tickOptions: TickOptions = {
        tickIntervalMs: options.tickIntervalMs,
        maxCatchUpTicks: options.maxCatchUpTicks,
    };

    const state: GameState = createGameState(clock());
    let phase: SessionPhase = 'idle';
    let timer: NodeJS.Timeout | null = null;
    let queue: Promise<void> = Promise.resolve();

    const notifier: SimulationNotifier = {
        message: (text, severity) => post({ type: 'message', text, severity }),
        ageAdvanced: (age) => post({ type: 'ageAdvanced', age }),
    };

    // -----------------------------------------------------------------
    // Ticks
    // -----------------------------------------------------------------

    function runTicks(): void {
        const start = Date.now();
        let processed = 0;
        try {
            processed = processElapsedTicks(state, clock(), tickOptions, notifier);
        } catch (err) {
            console.error('[worker] Error while advancing:', err);
        }
        const elapsedMs = Date.now() - start;
        if (options.debug) {
            console.log(`[worker] Tick ${state.tick} (${processed} processed) completed in ${elapsedMs}ms`);
        }
        post({ type: 'tick', tick: state.tick, processed, elapsedMs });
    }

    function scheduleTick(): void {
        timer = setTimeout(() => {
            timer = null;
            if (phase !== 'running') {
                return;
            }
            runTicks();
            scheduleTick();
        }, options.tickIntervalMs);
    }

    // -----------------------------------------------------------------
    // Commands
    // -----------------------------------------------------------------

    async function runCommand(line: string): Promise<CommandResult> {
        if (phase !== 'running') {
            return { messages: [{ text: 'The game is not running.', severity: 'error' }], quit: phase === 'stopped' };
        }
        const result = await executeCommand(state, line, { saveStore: options.saveStore, now: clock() });
        if (result.quit) {
            stop();
        } else if (phase === 'running') {
            runTicks();
        }
        return result;
    }

    function enqueueCommand(requestId: number, line: string): void {
        queue = queue
            .then(async () => {
                let result: CommandResult;
                try {
                    result = await runCommand(line);
                } catch (err) {
                    console.error('[worker] Command failed:', line, err);
                    const text = err instanceof Error ? err.message : String(err);
                    result = { messages: [{ text: `Command failed: ${text}`, severity: 'error' }], quit: false };
                }
                post({ type: 'reply', requestId, result });
            })
            .catch((err: unknown) => {
                console.error('[worker] Failed to deliver command reply:', err);
            });
    }

    // -----------------------------------------------------------------
    // Lifecycle
    // -----------------------------------------------------------------

    function start(): void {
        if (phase !== 'idle') {
            return;
        }
        phase = 'running';
        state.lastUpdateTime = clock();
        console.log(`[worker] Session started (tick interval: ${options.tickIntervalMs}ms)`);
        scheduleTick();
    }

    function stop(): void {
        if (phase === 'stopped') {
            return;
        }
        phase = 'stopped';
        if (timer) {
            clearTimeout(timer);
            timer = null;
        }
    }

    function handle(msg: InboundMessage): void {
        switch (msg.type) {
            case 'ping':
                post({ type: 'pong', tick: state.tick, phase });
                return;
            case 'command':
                enqueueCommand(msg.requestId, msg.line);
                return;
            case 'snapshot':
                post({ type: 'state', requestId: msg.requestId, snapshot: toStateSnapshot(state, options.tickIntervalMs) });
                return;
            case 'shutdown':
                stop();
                return;
        }
    }

    return {
        state,
        phase: () => phase,
        start,
        stop,
        handle,
        drain: () => queue,
    };
}
