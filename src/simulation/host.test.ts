import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import type { SaveStore } from './commands';
import type { OutboundMessage, SimulationHost } from './host';
import { createSimulationHost } from './host';

const noSaves: SaveStore = {
    save: async () => undefined,
    load: async () => null,
    list: async () => [],
};

const INTERVAL = 60_000;

describe('simulation host', () => {
    let now: number;
    let posted: OutboundMessage[];
    let host: SimulationHost;

    const ofType = <T extends OutboundMessage['type']>(type: T) =>
        posted.filter((m): m is Extract<OutboundMessage, { type: T }> => m.type === type);

    const command = async (requestId: number, line: string) => {
        host.handle({ type: 'command', requestId, line });
        await host.drain();
        return ofType('reply').find((r) => r.requestId === requestId)?.result;
    };

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => undefined);
        now = 0;
        posted = [];
        // Long interval: the real timer never fires during a test.
        host = createSimulationHost(
            { tickIntervalMs: INTERVAL, maxCatchUpTicks: 100, saveStore: noSaves, clock: () => now },
            (msg) => posted.push(msg),
        );
    });

    afterEach(() => {
        host.stop();
        vi.useRealTimers();
        vi.restoreAllMocks();
    });

    it('answers pings with the tick and phase', () => {
        host.handle({ type: 'ping' });
        expect(posted).toEqual([{ type: 'pong', tick: 0, phase: 'idle' }]);
    });

    it('refuses commands before the session starts', async () => {
        expect(await command(1, 'status')).toEqual({
            messages: [{ text: 'The game is not running.', severity: 'error' }],
            quit: false,
        });
        expect(host.state.tick).toBe(0);
    });

    it('runs a batch of ticks after each command', async () => {
        host.start();

        const result = await command(1, 'gather wood 1');

        expect(result?.messages).toEqual([{ text: 'Assigned 1 villagers to gather wood', severity: 'success' }]);
        expect(host.state.tick).toBe(1);
        expect(host.state.resources.stocks.wood).toBe(16);
        expect(posted.map((m) => m.type)).toEqual(['tick', 'reply']);
        expect(ofType('tick')[0]).toMatchObject({ tick: 1, processed: 1 });
    });

    it('catches up whole intervals since the last batch', async () => {
        host.start();
        await command(1, 'status');

        now = 3 * INTERVAL + 500;
        await command(2, 'status');

        expect(host.state.tick).toBe(4);
        expect(ofType('tick').map((m) => m.processed)).toEqual([1, 3]);
    });

    it('handles queued commands in order', async () => {
        host.start();
        host.handle({ type: 'command', requestId: 1, line: 'gather wood 1' });
        host.handle({ type: 'command', requestId: 2, line: 'gather wood 1' });
        await host.drain();

        expect(ofType('reply').map((r) => [r.requestId, r.result.messages[0].severity])).toEqual([
            [1, 'success'],
            [2, 'error'],
        ]);
    });

    it('forwards age advancement from the tick loop', async () => {
        host.start();
        const { stocks } = host.state.resources;
        stocks.stone = 50;
        stocks.foraging = 100;
        host.state.buildings.counts.hut = 3;
        host.state.buildings.counts.farm = 2;

        await command(1, 'status');

        expect(ofType('ageAdvanced')).toEqual([{ type: 'ageAdvanced', age: 'Bronze Age' }]);
        expect(host.state.age).toBe('Bronze Age');
    });

    it('serves snapshots straight away', () => {
        host.handle({ type: 'snapshot', requestId: 7 });

        const [state] = ofType('state');
        expect(state.requestId).toBe(7);
        expect(state.snapshot).toMatchObject({ age: 'Stone Age', tick: 0, tickIntervalMs: INTERVAL });
    });

    it('stops on quit and refuses later commands', async () => {
        host.start();

        expect(await command(1, 'quit')).toEqual({ messages: [{ text: 'Goodbye!', severity: 'info' }], quit: true });
        expect(host.phase()).toBe('stopped');
        expect(ofType('tick')).toEqual([]);

        expect(await command(2, 'status')).toEqual({
            messages: [{ text: 'The game is not running.', severity: 'error' }],
            quit: true,
        });
    });

    it('does not tick after a session stopped while a command was waiting', async () => {
        const stoppingStore: SaveStore = {
            ...noSaves,
            save: async () => {
                stopping.stop();
            },
        };
        const stopping = createSimulationHost(
            { tickIntervalMs: INTERVAL, maxCatchUpTicks: 100, saveStore: stoppingStore, clock: () => now },
            (msg) => posted.push(msg),
        );
        stopping.start();

        stopping.handle({ type: 'command', requestId: 1, line: 'save slot1' });
        await stopping.drain();

        expect(stopping.phase()).toBe('stopped');
        expect(stopping.state.tick).toBe(0);
        expect(ofType('tick')).toEqual([]);
        expect(ofType('reply')[0].result.messages).toEqual([{ text: "Game saved as 'slot1'", severity: 'success' }]);
    });

    it('ticks on its own timer while running', () => {
        vi.useFakeTimers();
        vi.setSystemTime(0);
        const timed = createSimulationHost(
            { tickIntervalMs: 1000, maxCatchUpTicks: 100, saveStore: noSaves },
            (msg) => posted.push(msg),
        );

        timed.start();
        vi.advanceTimersByTime(3_000);
        timed.stop();
        vi.advanceTimersByTime(5_000);

        expect(timed.state.tick).toBe(3);
        expect(ofType('tick').map((m) => m.tick)).toEqual([1, 2, 3]);
    });
});
