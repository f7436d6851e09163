/**
 * Engine configuration
 *
 * Every section has defaults, so `resolveConfig()` with no input is valid.
 */

import { z } from 'zod';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Configuration schema with validation
 */
export const engineConfigSchema = z.object({
    clock: z.object({
        // Remote readings further ahead than this are logged, never rejected
        maxDriftMs: z.number().int().positive().default(5 * 60 * 1000),
    }).default({}),

    compaction: z.object({
        enabled: z.boolean().default(true),
        maxLogEntries: z.number().int().positive().default(10_000),
        checkpointInterval: z.number().int().positive().default(1_000),
    }).default({}),

    sync: z.object({
        batchSize: z.number().int().positive().default(256),
        receiveTimeoutMs: z.number().int().positive().default(30_000),
    }).default({}),

    search: z.object({
        weights: z.object({
            lexical: z.number().nonnegative().default(0.6),
            vector: z.number().nonnegative().default(0.3),
            recency: z.number().nonnegative().default(0.1),
        }).default({}).refine(
            (w) => w.lexical + w.vector + w.recency > 0,
            { message: 'At least one search weight must be positive' },
        ),
        recencyHalfLifeMs: z.number().positive().default(30 * DAY_MS),
        hnsw: z.object({
            m: z.number().int().min(2).default(16),
            efConstruction: z.number().int().positive().default(100),
            efSearch: z.number().int().positive().default(64),
        }).default({}),
    }).default({}),
});

export type EngineConfig = z.infer<typeof engineConfigSchema>;
export type EngineConfigInput = z.input<typeof engineConfigSchema>;
export type SearchWeights = EngineConfig['search']['weights'];

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolveConfig(input: EngineConfigInput = {}): EngineConfig {
    return engineConfigSchema.parse(input);
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw === '') {
        return undefined;
    }
    return Number(raw);
}

/**
 * Load and validate configuration from environment variables
 * Unset variables fall back to defaults; malformed ones fail validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const raw = {
        clock: {
            maxDriftMs: readNumber(env, 'MARKSYNC_CLOCK_MAX_DRIFT_MS'),
        },
        compaction: {
            enabled: env.MARKSYNC_COMPACTION_ENABLED === undefined
                ? undefined
                : env.MARKSYNC_COMPACTION_ENABLED !== 'false',
            maxLogEntries: readNumber(env, 'MARKSYNC_COMPACTION_MAX_LOG_ENTRIES'),
            checkpointInterval: readNumber(env, 'MARKSYNC_COMPACTION_CHECKPOINT_INTERVAL'),
        },
        sync: {
            batchSize: readNumber(env, 'MARKSYNC_SYNC_BATCH_SIZE'),
            receiveTimeoutMs: readNumber(env, 'MARKSYNC_SYNC_RECEIVE_TIMEOUT_MS'),
        },
        search: {
            weights: {
                lexical: readNumber(env, 'MARKSYNC_SEARCH_WEIGHT_LEXICAL'),
                vector: readNumber(env, 'MARKSYNC_SEARCH_WEIGHT_VECTOR'),
                recency: readNumber(env, 'MARKSYNC_SEARCH_WEIGHT_RECENCY'),
            },
            recencyHalfLifeMs: readNumber(env, 'MARKSYNC_SEARCH_RECENCY_HALF_LIFE_MS'),
            hnsw: {
                m: readNumber(env, 'MARKSYNC_SEARCH_HNSW_M'),
                efConstruction: readNumber(env, 'MARKSYNC_SEARCH_HNSW_EF_CONSTRUCTION'),
                efSearch: readNumber(env, 'MARKSYNC_SEARCH_HNSW_EF_SEARCH'),
            },
        },
    };

    return engineConfigSchema.parse(raw);
}
