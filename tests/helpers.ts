// tests/helpers.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import { RemoteFetcher } from '../src/infrastructure/http/HttpFetcher';
import { LogContext, LogSink } from '../src/core/logging/Logger';
import { ErrorFactory } from '../src/core/errors';

/**
 * In-memory stand-in for the metadata and script hosts.
 * Unknown URLs answer like a 404.
 */
export class FakeFetcher implements RemoteFetcher {
    private responses: Map<string, Buffer | Error> = new Map();
    private gates: Map<string, Promise<void>> = new Map();
    public readonly requests: string[] = [];

    public serve(url: string, body: Buffer | string | object): void {
        if (Buffer.isBuffer(body)) {
            this.responses.set(url, body);
        } else {
            this.responses.set(url, Buffer.from(typeof body === 'string' ? body : JSON.stringify(body), 'utf8'));
        }
    }

    public fail(url: string, error: Error = new Error('connect ECONNREFUSED')): void {
        this.responses.set(url, error);
    }

    /**
     * Holds requests for `url` until the returned function is called.
     */
    public hold(url: string): () => void {
        let release: () => void = () => undefined;
        this.gates.set(url, new Promise<void>((resolve) => {
            release = resolve;
        }));
        return () => release();
    }

    public requestCount(url: string): number {
        return this.requests.filter((requested) => requested === url).length;
    }

    public async fetchText(url: string): Promise<string> {
        return (await this.fetchBuffer(url)).toString('utf8');
    }

    public async fetchBuffer(url: string): Promise<Buffer> {
        this.requests.push(url);
        const gate = this.gates.get(url);
        if (gate) {
            await gate;
        }

        const response = this.responses.get(url);
        if (response === undefined) {
            throw ErrorFactory.fetch(`GET ${url} returned HTTP 404`, { url });
        }
        if (response instanceof Error) {
            throw response;
        }
        return response;
    }
}

export interface LogEntry {
    level: 'debug' | 'info' | 'warn' | 'error';
    component: string;
    message: string;
    context?: unknown;
}

export class RecordingSink implements LogSink {
    public readonly entries: LogEntry[] = [];

    public debug(component: string, message: string, context?: LogContext): void {
        this.entries.push({ level: 'debug', component, message, context });
    }

    public info(component: string, message: string, context?: LogContext): void {
        this.entries.push({ level: 'info', component, message, context });
    }

    public warn(component: string, message: string, context?: LogContext): void {
        this.entries.push({ level: 'warn', component, message, context });
    }

    public error(component: string, message: string, error?: unknown): void {
        this.entries.push({ level: 'error', component, message, context: error });
    }

    public messages(level: LogEntry['level']): string[] {
        return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
    }
}

export function makeStorageDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'scraper-registry-'));
}

export function removeStorageDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

export function readPersisted(dir: string): unknown {
    return JSON.parse(fs.readFileSync(path.join(dir, 'modules.json'), 'utf8'));
}
