#!/usr/bin/env node
/**
 * cli/main.ts
 *
 * Terminal front end: a readline prompt for commands and a dashboard
 * refreshed on a timer.  The game itself runs in the simulation worker;
 * this process only sends it command lines and renders what comes back.
 */

import readline from 'node:readline';
import { loadConfig } from '../config';
import {
    onWorkerMessage,
    requestSnapshot,
    runCommand,
    startWorker,
    stopWorker,
} from '../simulation/workerManager';
import { TerminalDisplay } from './display';

async function main(): Promise<void> {
    const config = loadConfig();

    const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
    const display = new TerminalDisplay({
        output: process.stdout,
        clear: process.stdout.isTTY === true,
        onRedraw: () => rl.prompt(true),
    });

    startWorker({
        tickIntervalMs: config.tickIntervalMs,
        maxCatchUpTicks: config.maxCatchUpTicks,
        saveDbPath: config.saveDbPath,
        simDebug: config.simDebug,
        requestTimeoutMs: config.requestTimeoutMs,
    });

    const unsubscribe = onWorkerMessage((msg) => {
        switch (msg.type) {
            case 'message':
                display.showMessage(msg.text, msg.severity);
                break;
            case 'ageAdvanced':
                display.showAgeAdvancement(msg.age);
                break;
            case 'workerRestarted':
                display.showMessage(`The simulation restarted (${msg.reason ?? 'unknown reason'}).`, 'warning');
                break;
        }
    });

    // -----------------------------------------------------------------
    // Refresh activity
    // -----------------------------------------------------------------

    let refreshing = false;
    const refresh = async (): Promise<void> => {
        if (refreshing) {
            return;
        }
        refreshing = true;
        try {
            display.push(await requestSnapshot());
        } catch (err) {
            console.error('[cli] Refresh failed:', err instanceof Error ? err.message : err);
        } finally {
            refreshing = false;
        }
    };

    const refreshTimer = setInterval(() => {
        refresh().catch((err: unknown) => console.error('[cli] Refresh failed:', err));
    }, config.refreshIntervalMs);

    // -----------------------------------------------------------------
    // Shutdown
    // -----------------------------------------------------------------

    let stopping: Promise<void> | null = null;
    const shutdown = (): Promise<void> => {
        if (!stopping) {
            stopping = (async () => {
                clearInterval(refreshTimer);
                unsubscribe();
                display.release();
                rl.close();
                await stopWorker();
            })();
        }
        return stopping;
    };

    const shutdownOnSignal = (signal: string) => () => {
        console.log(`[cli] Received ${signal}, shutting down`);
        shutdown().catch((err: unknown) => {
            console.error('[cli] Shutdown failed:', err);
            process.exitCode = 1;
        });
    };
    rl.on('SIGINT', shutdownOnSignal('SIGINT'));
    process.on('SIGINT', shutdownOnSignal('SIGINT'));
    process.on('SIGTERM', shutdownOnSignal('SIGTERM'));

    // -----------------------------------------------------------------
    // Command loop
    // -----------------------------------------------------------------

    const handleLine = async (line: string): Promise<void> => {
        if (line.trim() === '') {
            rl.prompt();
            return;
        }
        const result = await runCommand(line);
        if (result.quit) {
            await shutdown();
            for (const message of result.messages) {
                console.log(message.text);
            }
            return;
        }
        for (const message of result.messages) {
            display.showMessage(message.text, message.severity);
        }
        await refresh();
    };

    rl.on('line', (line) => {
        handleLine(line).catch((err: unknown) => {
            display.showMessage(`Command failed: ${err instanceof Error ? err.message : String(err)}`, 'error');
            rl.prompt();
        });
    });
    rl.on('close', () => {
        shutdown().catch((err: unknown) => console.error('[cli] Shutdown failed:', err));
    });

    display.showMessage("Welcome! Type 'help' for a list of commands.", 'info');
    await refresh();
    rl.prompt();
}

main().catch((err: unknown) => {
    console.error('[cli] Fatal:', err);
    process.exitCode = 1;
});
