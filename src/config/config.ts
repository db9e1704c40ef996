// src/config/config.ts

import path from 'path';
import { ENV } from './env';
import { findProjectRoot } from './projectRoot';

const PROJECT_ROOT = findProjectRoot();

interface ServerConfig {
    NAME: string;
    VERSION: string;
}

interface PathsConfig {
    PROJECT_ROOT: string;
    STORAGE_DIR: string;
}

interface RegistryConfig {
    MODULES_FILE_NAME: string;
    SCRIPT_EXTENSION: string;
}

interface HttpConfig {
    FETCH_TIMEOUT_MS: number;
}

interface RefreshConfig {
    INTERVAL_MS: number;
}

interface RateLimitConfig {
    WINDOW_MS: number;
    MAX_REQUESTS: number;
    MAX_REMOTE_REQUESTS: number;
}

interface Config {
    SERVER: ServerConfig;
    PATHS: PathsConfig;
    REGISTRY: RegistryConfig;
    HTTP: HttpConfig;
    REFRESH: RefreshConfig;
    RATE_LIMIT: RateLimitConfig;
}

/**
 * Centralized configuration for the scraper module registry.
 */
export const CONFIG: Config = {
    SERVER: {
        NAME: 'scraper-registry',
        VERSION: '1.0.0',
    },

    PATHS: {
        PROJECT_ROOT,
        STORAGE_DIR: ENV.STORAGE_DIR
            ? path.resolve(ENV.STORAGE_DIR)
            : path.join(PROJECT_ROOT, 'data', 'modules'),
    },

    REGISTRY: {
        MODULES_FILE_NAME: 'modules.json',
        SCRIPT_EXTENSION: '.js',
    },

    HTTP: {
        FETCH_TIMEOUT_MS: ENV.FETCH_TIMEOUT_MS,
    },

    REFRESH: {
        INTERVAL_MS: ENV.REFRESH_INTERVAL_MS,
    },

    RATE_LIMIT: {
        WINDOW_MS: 60 * 1000, // 1 minute
        MAX_REQUESTS: ENV.RATE_LIMIT_MAX_REQUESTS,
        MAX_REMOTE_REQUESTS: ENV.RATE_LIMIT_MAX_REMOTE_REQUESTS,
    },
};
