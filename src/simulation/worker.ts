/**
 * simulation/worker.ts
 *
 * Runs inside a dedicated worker_thread.
 * Owns the authoritative GameState through a SimulationHost and talks to
 * the main thread only via parentPort messages.
 */

import { parentPort, workerData } from 'node:worker_threads';
import { z } from 'zod';
import { createSaveDatabase, IN_MEMORY } from '../persistence/db';
import { createKnexSaveStore } from '../persistence/saveRepository';
import { DEFAULT_MAX_CATCH_UP_TICKS, DEFAULT_TICK_INTERVAL_MS } from './constants';
import type { InboundMessage, OutboundMessage } from './host';
import { createSimulationHost } from './host';

export type { InboundMessage, OutboundMessage } from './host';

export const workerDataSchema = z.object({
    tickIntervalMs: z.number().int().nonnegative().default(DEFAULT_TICK_INTERVAL_MS),
    maxCatchUpTicks: z.number().int().positive().default(DEFAULT_MAX_CATCH_UP_TICKS),
    saveDbPath: z.string().min(1).default(IN_MEMORY),
    simDebug: z.boolean().default(false),
});

export type SimulationWorkerData = z.input<typeof workerDataSchema>;

const config = workerDataSchema.parse(workerData ?? {});
if (config.simDebug) {
    process.env.SIM_DEBUG = '1';
}

const db = createSaveDatabase(config.saveDbPath);

let channelOpen = true;

/** parentPort.postMessage that goes quiet once the main thread has torn the channel down. */
function safePostMessage(msg: OutboundMessage): void {
    if (!channelOpen) {
        return;
    }
    try {
        parentPort?.postMessage(msg);
    } catch (err: unknown) {
        if (err instanceof Error && 'code' in err && (err.code === 'EPIPE' || err.code === 'ERR_WORKER_OUT')) {
            channelOpen = false;
            host.stop();
            return;
        }
        throw err;
    }
}

const host = createSimulationHost(
    {
        tickIntervalMs: config.tickIntervalMs,
        maxCatchUpTicks: config.maxCatchUpTicks,
        saveStore: createKnexSaveStore(db),
        debug: config.simDebug,
    },
    safePostMessage,
);

parentPort?.on('message', (msg: InboundMessage) => {
    host.handle(msg);

    if (msg.type === 'shutdown') {
        console.log('[worker] Received shutdown request, exiting');
        db.destroy().catch((err: unknown) => {
            console.error('[worker] Failed to close save database:', err);
        });
        setTimeout(() => process.exit(0), 50);
    }
});

// Stray EPIPE errors can surface while the channel is being torn down.
process.on('uncaughtException', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EPIPE') {
        channelOpen = false;
        host.stop();
        return;
    }
    throw err;
});

host.start();
