import { z } from 'zod';
import { DEFAULT_MAX_CATCH_UP_TICKS, DEFAULT_TICK_INTERVAL_MS } from './simulation/constants';

const flag = z
    .enum(['0', '1', 'true', 'false'])
    .default('0')
    .transform((v) => v === '1' || v === 'true');

const envSchema = z.object({
    TICK_INTERVAL_MS: z.coerce.number().int().positive().default(DEFAULT_TICK_INTERVAL_MS),
    MAX_CATCH_UP_TICKS: z.coerce.number().int().positive().default(DEFAULT_MAX_CATCH_UP_TICKS),
    REFRESH_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
    SAVE_DB_PATH: z.string().min(1).default('data/saves.sqlite'),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
    SIM_DEBUG: flag,
});

export type AppConfig = {
    tickIntervalMs: number;
    maxCatchUpTicks: number;
    refreshIntervalMs: number;
    saveDbPath: string;
    requestTimeoutMs: number;
    simDebug: boolean;
};

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/** Read configuration from environment variables; empty values count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
    const result = envSchema.safeParse(present);
    if (!result.success) {
        const details = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`);
    }
    const e = result.data;
    return {
        tickIntervalMs: e.TICK_INTERVAL_MS,
        maxCatchUpTicks: e.MAX_CATCH_UP_TICKS,
        refreshIntervalMs: e.REFRESH_INTERVAL_MS,
        saveDbPath: e.SAVE_DB_PATH,
        requestTimeoutMs: e.REQUEST_TIMEOUT_MS,
        simDebug: e.SIM_DEBUG,
    };
}
