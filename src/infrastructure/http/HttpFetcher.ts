import { CONFIG } from '../../config/config';
import { ErrorFactory, describeError } from '../../core/errors';

/**
 * Anything that can GET a URL and hand back its body.
 * Metadata is read as text; scripts are read as raw bytes.
 */
export interface RemoteFetcher {
    fetchText(url: string): Promise<string>;
    fetchBuffer(url: string): Promise<Buffer>;
}

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

/**
 * RemoteFetcher over the global fetch.
 * Transport failures and non-2xx answers both surface as FetchError.
 */
export class HttpFetcher implements RemoteFetcher {
    private readonly timeoutMs: number;

    constructor(timeoutMs: number = CONFIG.HTTP.FETCH_TIMEOUT_MS) {
        this.timeoutMs = timeoutMs;
    }

    public async fetchText(url: string): Promise<string> {
        const response = await this.get(url);
        return await this.readBody(url, () => response.text());
    }

    /**
     * The body exactly as served: no charset decoding, BOM included.
     */
    public async fetchBuffer(url: string): Promise<Buffer> {
        const response = await this.get(url);
        return await this.readBody(url, async () => Buffer.from(await response.arrayBuffer()));
    }

    private async get(url: string): Promise<FetchResponse> {
        let response: FetchResponse;
        try {
            response = await fetch(url, {
                method: 'GET',
                signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined
            });
        } catch (error) {
            throw ErrorFactory.fetch(`GET ${url} failed: ${describeError(error)}`, {
                operation: 'fetch',
                url,
                cause: error
            });
        }

        if (!response.ok) {
            throw ErrorFactory.fetch(`GET ${url} returned HTTP ${response.status}`, {
                operation: 'fetch',
                url
            });
        }
        return response;
    }

    private async readBody<T>(url: string, read: () => Promise<T>): Promise<T> {
        try {
            return await read();
        } catch (error) {
            throw ErrorFactory.fetch(`Failed to read body of ${url}: ${describeError(error)}`, {
                operation: 'fetch',
                url,
                cause: error
            });
        }
    }
}
