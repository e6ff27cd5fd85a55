/**
 * simulation.test.ts
 *
 * Integration tests for the simulation worker lifecycle and messaging.
 */

import { Worker } from 'node:worker_threads';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { InboundMessage, OutboundMessage, SimulationWorkerData } from './worker';

const WORKER_PATH = path.resolve(__dirname, './worker.ts');
const TIMEOUT = 10_000;

describe('Simulation Worker', () => {
    let worker: Worker;

    const send = (msg: InboundMessage) => worker.postMessage(msg);

    const nextMessage = <T extends OutboundMessage['type']>(
        type: T,
        match: (msg: Extract<OutboundMessage, { type: T }>) => boolean = () => true,
    ): Promise<Extract<OutboundMessage, { type: T }>> =>
        new Promise((resolve) => {
            const isWanted = (msg: OutboundMessage): msg is Extract<OutboundMessage, { type: T }> =>
                msg.type === type;
            const listener = (msg: OutboundMessage) => {
                if (isWanted(msg) && match(msg)) {
                    worker.off('message', listener);
                    resolve(msg);
                }
            };
            worker.on('message', listener);
        });

    beforeEach(() => {
        const workerData: SimulationWorkerData = { tickIntervalMs: 0 }; // faster ticks for tests
        worker = new Worker(WORKER_PATH, {
            execArgv: ['--require', 'tsx/cjs'],
            workerData,
        });
    });

    afterEach(async () => {
        await worker.terminate();
    });

    it(
        'increments tick counter over time',
        async () => {
            const ticks: number[] = [];

            await new Promise<void>((resolve) => {
                worker.on('message', (msg: OutboundMessage) => {
                    if (msg.type === 'tick') {
                        ticks.push(msg.tick);
                        if (ticks.length >= 3) {
                            resolve();
                        }
                    }
                });
            });

            expect(ticks.slice(0, 3)).toEqual([1, 2, 3]);
        },
        TIMEOUT,
    );

    it(
        'answers a ping with the running phase',
        async () => {
            const pong = nextMessage('pong');
            send({ type: 'ping' });

            expect(await pong).toMatchObject({ type: 'pong', phase: 'running' });
        },
        TIMEOUT,
    );

    it(
        'replies to a command with its request id',
        async () => {
            const reply = nextMessage('reply', (m) => m.requestId === 41);
            send({ type: 'command', requestId: 41, line: 'gather wood 1' });

            expect((await reply).result).toEqual({
                messages: [{ text: 'Assigned 1 villagers to gather wood', severity: 'success' }],
                quit: false,
            });
        },
        TIMEOUT,
    );

    it(
        'serves a snapshot of the live state',
        async () => {
            const state = nextMessage('state', (m) => m.requestId === 3);
            send({ type: 'snapshot', requestId: 3 });

            const { snapshot } = await state;
            expect(snapshot.age).toBe('Stone Age');
            expect(snapshot.tickIntervalMs).toBe(0);
            expect(snapshot.workforce.villager.count).toBe(1);
        },
        TIMEOUT,
    );

    it(
        'exits cleanly on shutdown',
        async () => {
            const exited = new Promise<number>((resolve) => worker.once('exit', resolve));
            send({ type: 'shutdown' });

            expect(await exited).toBe(0);
        },
        TIMEOUT,
    );
});
