/**
 * simulation/workerManager.ts
 *
 * Manages the lifecycle of the simulation worker thread:
 *   - spawn on startup
 *   - crash detection + restart
 *   - graceful shutdown
 *   - typed messages and request/reply with timeouts
 */

import path from 'node:path';
import fs from 'node:fs';
import { createRequire } from 'node:module';
import { Worker } from 'node:worker_threads';
import type { WorkerOptions } from 'node:worker_threads';

import type { CommandResult } from './commands';
import type { StateSnapshot } from './snapshot';
import type { InboundMessage, OutboundMessage, SimulationWorkerData } from './worker';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type MessageHandler = (msg: OutboundMessage) => void;

export type WorkerManagerOptions = SimulationWorkerData & {
    requestTimeoutMs?: number;
};

type PendingRequest = {
    settle: (msg: OutboundMessage) => void;
    fail: (err: Error) => void;
    timer: NodeJS.Timeout;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
const SHUTDOWN_GRACE_MS = 2000;

// ---------------------------------------------------------------------------
// Module-level state
// ---------------------------------------------------------------------------

let worker: Worker | null = null;
let workerOptions: WorkerManagerOptions = {};
const messageHandlers = new Set<MessageHandler>();
const pending = new Map<number, PendingRequest>();
let nextRequestId = 1;
let isShuttingDown = false;

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** The worker beside this module: worker.ts under tsx, worker.js once compiled. */
function resolveWorkerPath(): string {
    const candidates = [path.resolve(__dirname, 'worker.js'), path.resolve(__dirname, 'worker.ts')];
    const found = candidates.find((p) => fs.existsSync(p));
    if (!found) {
        throw new Error(`Simulation worker not found next to ${__dirname}`);
    }
    return found;
}

function failPending(reason: string): void {
    for (const [id, request] of pending) {
        clearTimeout(request.timer);
        request.fail(new Error(reason));
        pending.delete(id);
    }
}

function dispatch(msg: OutboundMessage): void {
    if (msg.type === 'reply' || msg.type === 'state') {
        const request = pending.get(msg.requestId);
        if (request) {
            pending.delete(msg.requestId);
            clearTimeout(request.timer);
            request.settle(msg);
        }
    }
    messageHandlers.forEach((h) => h(msg));
}

function spawnWorker(): Worker {
    const workerPath = resolveWorkerPath();
    const { requestTimeoutMs: _timeout, ...workerData } = workerOptions;
    const options: WorkerOptions = { workerData };

    // TypeScript sources need the tsx loader inside the thread as well.
    if (workerPath.endsWith('.ts')) {
        const requireFn = createRequire(__filename);
        const resolved = requireFn.resolve('tsx/cjs');
        options.execArgv = ['--require', resolved];
        console.log(`[workerManager] Preloading tsx/cjs -> ${resolved}`);
    }

    console.log(`[workerManager] Spawning worker at: ${workerPath}`);
    const w = new Worker(workerPath, options);

    w.on('message', (msg: OutboundMessage) => dispatch(msg));

    w.on('error', (err) => {
        console.error('[workerManager] Worker error:', err);
    });

    w.on('exit', (code) => {
        if (worker !== w) {
            return;
        }
        failPending(`Worker exited (code ${code})`);
        if (!isShuttingDown) {
            console.warn(`[workerManager] Worker exited unexpectedly (code ${code}). Restarting…`);
            worker = spawnWorker();
            messageHandlers.forEach((h) => h({ type: 'workerRestarted', reason: `exit code ${code}` }));
        } else {
            console.log('[workerManager] Worker shut down gracefully.');
        }
    });

    return w;
}

function request(build: (requestId: number) => InboundMessage): Promise<OutboundMessage> {
    const requestId = nextRequestId++;
    const timeoutMs = workerOptions.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    return new Promise<OutboundMessage>((resolve, reject) => {
        const timer = setTimeout(() => {
            pending.delete(requestId);
            reject(new Error(`Worker did not answer request ${requestId} within ${timeoutMs}ms`));
        }, timeoutMs);
        pending.set(requestId, { settle: resolve, fail: reject, timer });
        try {
            sendToWorker(build(requestId));
        } catch (err) {
            clearTimeout(timer);
            pending.delete(requestId);
            reject(err);
        }
    });
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Start the simulation worker.
 * Safe to call multiple times – only one worker is kept alive.
 */
export function startWorker(options: WorkerManagerOptions = {}): void {
    if (worker) {
        return;
    }
    workerOptions = options;
    isShuttingDown = false;
    worker = spawnWorker();
}

export function isWorkerRunning(): boolean {
    return worker !== null;
}

/**
 * Send a typed message to the worker.
 */
export function sendToWorker(msg: InboundMessage): void {
    if (!worker) {
        throw new Error('Worker is not running');
    }
    worker.postMessage(msg);
}

/**
 * Register a listener for messages coming from the worker.
 * Returns an unsubscribe function.
 */
export function onWorkerMessage(handler: MessageHandler): () => void {
    messageHandlers.add(handler);
    return () => {
        messageHandlers.delete(handler);
    };
}

/** Run one command line in the worker and wait for its result. */
export async function runCommand(line: string): Promise<CommandResult> {
    const msg = await request((requestId) => ({ type: 'command', requestId, line }));
    if (msg.type !== 'reply') {
        throw new Error(`Unexpected answer '${msg.type}' to a command`);
    }
    return msg.result;
}

export async function requestSnapshot(): Promise<StateSnapshot> {
    const msg = await request((requestId) => ({ type: 'snapshot', requestId }));
    if (msg.type !== 'state') {
        throw new Error(`Unexpected answer '${msg.type}' to a snapshot request`);
    }
    return msg.snapshot;
}

/**
 * Ask the worker to stop and wait for it to exit; terminate it if it does
 * not go within the grace period.
 */
export async function stopWorker(): Promise<void> {
    const w = worker;
    if (!w) {
        return;
    }
    isShuttingDown = true;

    await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
            w.terminate().then(
                () => resolve(),
                (err: unknown) => {
                    console.error('[workerManager] Error terminating worker:', err);
                    resolve();
                },
            );
        }, SHUTDOWN_GRACE_MS);
        w.once('exit', () => {
            clearTimeout(timer);
            resolve();
        });
        try {
            w.postMessage({ type: 'shutdown' } satisfies InboundMessage);
        } catch (err) {
            console.error('[workerManager] Could not send shutdown request:', err);
        }
    });

    failPending('Worker stopped');
    worker = null;
}
