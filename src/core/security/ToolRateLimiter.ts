// src/core/security/ToolRateLimiter.ts

import { CONFIG } from '../../config/config';
import { Logger } from '../logging/Logger';

/**
 * Tools that reach out to metadata and script hosts share the `remote`
 * budget; tools that only touch the local cache share `local`.
 */
export type ToolBucket = 'remote' | 'local';

const REMOTE_TOOLS: ReadonlySet<string> = new Set(['add_module', 'refresh_modules']);

export function bucketFor(toolName: string): ToolBucket {
    return REMOTE_TOOLS.has(toolName) ? 'remote' : 'local';
}

export interface ToolRateLimitConfig {
    windowMs: number;
    maxRequests: Record<ToolBucket, number>;
}

export type RateLimitDecision =
    | { allowed: true; bucket: ToolBucket; remaining: number }
    | { allowed: false; bucket: ToolBucket; retryAfterMs: number };

interface Window {
    requests: number;
    windowStart: number;
}

/**
 * Fixed-window limiter for MCP tool calls, one window per bucket.
 */
export class ToolRateLimiter {
    private windows: Map<ToolBucket, Window> = new Map();
    private readonly config: ToolRateLimitConfig;

    constructor(config: ToolRateLimitConfig = {
        windowMs: CONFIG.RATE_LIMIT.WINDOW_MS,
        maxRequests: {
            remote: CONFIG.RATE_LIMIT.MAX_REMOTE_REQUESTS,
            local: CONFIG.RATE_LIMIT.MAX_REQUESTS
        }
    }) {
        this.config = config;
    }

    /**
     * Counts one call of `toolName` against its bucket.
     */
    public consume(toolName: string, now: number = Date.now()): RateLimitDecision {
        const bucket = bucketFor(toolName);
        const limit = this.config.maxRequests[bucket];

        let window = this.windows.get(bucket);
        if (!window || now - window.windowStart >= this.config.windowMs) {
            window = { requests: 0, windowStart: now };
            this.windows.set(bucket, window);
        }

        if (window.requests >= limit) {
            const retryAfterMs = window.windowStart + this.config.windowMs - now;
            Logger.warn('ToolRateLimiter', `Rate limit exceeded for ${toolName}`, {
                bucket,
                limit,
                retryAfterMs
            });
            return { allowed: false, bucket, retryAfterMs };
        }

        window.requests++;
        return { allowed: true, bucket, remaining: limit - window.requests };
    }
}
