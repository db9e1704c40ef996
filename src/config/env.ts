// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { findProjectRoot } from './projectRoot';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.join(findProjectRoot(), '.env') });

const nonNegativeInt = z.coerce.number().int().min(0);

/**
 * Environment Variable Schema
 * Everything is optional; defaults describe a local development setup.
 */
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

    // Where modules.json and the cached scripts live
    STORAGE_DIR: z.string().min(1).optional(),

    // 0 disables the scheduled refresh
    REFRESH_INTERVAL_MS: nonNegativeInt.default(0),

    // 0 means the transport never times out
    FETCH_TIMEOUT_MS: nonNegativeInt.default(0),

    // Per minute, for tools that only read the local cache
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(30),

    // Per minute, for tools that fetch from remote hosts
    RATE_LIMIT_MAX_REMOTE_REQUESTS: z.coerce.number().int().positive().default(10),
});

export type Env = z.infer<typeof envSchema>;

export const ENV: Env = envSchema.parse(process.env);
