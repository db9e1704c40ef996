import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import {
    ModuleMetadata,
    ModuleMetadataSchema,
    ModuleRecord,
    ModuleSummary,
    RefreshSummary,
} from './types';
import { Logger, LogSink } from '../logging/Logger';
import { ErrorFactory, describeError, isRegistryError } from '../errors';
import { ModuleStore } from '../../infrastructure/storage/ModuleStore';
import { ScriptCache } from '../../infrastructure/storage/ScriptCache';
import { HttpFetcher, RemoteFetcher } from '../../infrastructure/http/HttpFetcher';

const COMPONENT = 'ModuleRegistry';

export interface ModuleRegistryOptions {
    fetcher?: RemoteFetcher;
    logger?: LogSink;
}

/**
 * Catalog of downloaded scraping modules.
 *
 * Holds the records in memory, mirrors them to `<storageDir>/modules.json`
 * after every mutation, and keeps the cached scripts in step with their
 * remote metadata. Every public method runs under one mutex, network I/O
 * included, so calls never interleave.
 */
export class ModuleRegistry {
    private modules: Map<string, ModuleRecord> = new Map();
    private mutex: Mutex = new Mutex();
    private readonly store: ModuleStore;
    private readonly fetcher: RemoteFetcher;
    private readonly logger: LogSink;

    private constructor(public readonly storageDir: string, options: ModuleRegistryOptions) {
        this.store = new ModuleStore(storageDir);
        this.fetcher = options.fetcher ?? new HttpFetcher();
        this.logger = options.logger ?? Logger;
    }

    /**
     * Builds a registry over `storageDir` and loads whatever modules.json holds.
     * A missing or unreadable file yields an empty registry.
     */
    public static async create(storageDir: string, options: ModuleRegistryOptions = {}): Promise<ModuleRegistry> {
        const registry = new ModuleRegistry(storageDir, options);
        await registry.load();
        return registry;
    }

    /**
     * Replaces the in-memory list with the persisted one.
     * Read or parse failures are logged and leave the current list untouched.
     */
    public async load(): Promise<void> {
        return await this.mutex.runExclusive(async () => {
            const result = await this.store.read();

            if (result.status === 'missing') {
                this.logger.debug(COMPONENT, 'No persisted modules yet', { path: this.store.filePath });
                return;
            }

            if (result.status === 'failed') {
                this.logger.warn(COMPONENT, 'Failed to load modules', {
                    path: this.store.filePath,
                    error: result.error.message
                });
                return;
            }

            this.modules = new Map(result.records.map((record): [string, ModuleRecord] => [record.id, record]));
            this.logger.debug(COMPONENT, `Loaded ${this.modules.size} module(s)`);
        });
    }

    /**
     * Writes the current list to modules.json. Failures are logged, never thrown.
     */
    public async save(): Promise<void> {
        return await this.mutex.runExclusive(() => this.persist());
    }

    /**
     * Registers the module described at `metadataURL`: fetches its metadata,
     * downloads the script into `storageDir` and records both.
     *
     * @throws AlreadyExistsError when the URL is already registered (exact string match)
     * @throws FetchError when the metadata or script cannot be retrieved
     * @throws ParseError when the metadata is not a JSON object of the expected shape
     * @throws IOError when the script cannot be written
     */
    public async add(metadataURL: string, storageDir: string = this.storageDir): Promise<ModuleRecord> {
        return await this.mutex.runExclusive(async () => {
            for (const mod of this.modules.values()) {
                if (mod.metadataURL === metadataURL) {
                    throw ErrorFactory.alreadyExists(`Module already exists for ${metadataURL}`, {
                        operation: 'add',
                        url: metadataURL,
                        moduleId: mod.id
                    });
                }
            }

            const metadata = await this.fetchMetadata(metadataURL);
            const script = await this.fetchScript(metadata.scriptURL);

            const fileName = ScriptCache.newFileName();
            await ScriptCache.write(storageDir, fileName, script);

            const module: ModuleRecord = {
                id: uuidv4(),
                metadata,
                localPath: fileName,
                metadataURL,
                isActive: false,
            };

            this.modules.set(module.id, module);
            await this.persist();

            this.logger.info(COMPONENT, 'Added module', { source: metadata.sourceName, id: module.id });
            return structuredClone(module);
        });
    }

    /**
     * Removes a module and its cached script. A script that cannot be
     * deleted is logged; the record goes regardless.
     *
     * @throws NotFoundError for an unknown id
     */
    public async delete(moduleId: string, storageDir: string = this.storageDir): Promise<void> {
        return await this.mutex.runExclusive(async () => {
            const module = this.modules.get(moduleId);
            if (!module) {
                throw ErrorFactory.notFound(`Module ${moduleId} not found`, { operation: 'delete', moduleId });
            }

            try {
                const outcome = await ScriptCache.remove(storageDir, module.localPath);
                if (outcome === 'missing') {
                    this.logger.debug(COMPONENT, 'Module script was already gone', { id: moduleId });
                }
            } catch (error) {
                this.logger.warn(COMPONENT, 'Failed to delete module script', {
                    source: module.metadata.sourceName,
                    error: describeError(error)
                });
            }

            this.modules.delete(moduleId);
            await this.persist();

            this.logger.info(COMPONENT, 'Deleted module', { source: module.metadata.sourceName, id: moduleId });
        });
    }

    /**
     * Id and source name of every module, in registration order.
     */
    public async list(): Promise<ModuleSummary[]> {
        return await this.mutex.runExclusive(async () =>
            Array.from(this.modules.values(), (mod) => ({
                id: mod.id,
                name: mod.metadata.sourceName,
            }))
        );
    }

    /**
     * The cached script of a module.
     *
     * @throws NotFoundError for an unknown id
     * @throws IOError when the script file is missing or unreadable
     */
    public async getContent(moduleId: string, storageDir: string = this.storageDir): Promise<string> {
        return await this.mutex.runExclusive(async () => {
            const module = this.modules.get(moduleId);
            if (!module) {
                throw ErrorFactory.notFound(`Module ${moduleId} not found`, { operation: 'getContent', moduleId });
            }
            return await ScriptCache.read(storageDir, module.localPath);
        });
    }

    /**
     * One refresh cycle: re-fetches every module's metadata and, where the
     * version changed, downloads the new script over the old file. A module
     * that fails at any step keeps its previous metadata and script. The list
     * is saved once at the end whatever happened.
     */
    public async refresh(storageDir: string = this.storageDir): Promise<RefreshSummary> {
        return await this.mutex.runExclusive(async () => {
            const summary: RefreshSummary = { updated: [], unchanged: [], failed: [] };

            for (const [id, mod] of this.modules) {
                const source = mod.metadata.sourceName;
                const fail = (message: string, error: unknown): void => {
                    const reason = describeError(error);
                    this.logger.warn(COMPONENT, message, { source, error: reason });
                    summary.failed.push({ id, sourceName: source, reason });
                };

                let newMetadata: ModuleMetadata;
                try {
                    newMetadata = await this.fetchMetadata(mod.metadataURL);
                } catch (error) {
                    fail('Failed to refresh module', error);
                    continue;
                }

                if (newMetadata.version === mod.metadata.version) {
                    summary.unchanged.push(id);
                    continue;
                }

                let script: Buffer;
                try {
                    script = await this.fetchScript(newMetadata.scriptURL);
                } catch (error) {
                    fail('Failed to fetch updated script', error);
                    continue;
                }

                try {
                    await ScriptCache.write(storageDir, mod.localPath, script);
                } catch (error) {
                    fail('Failed to save updated script', error);
                    continue;
                }

                this.modules.set(id, { ...mod, metadata: newMetadata });
                summary.updated.push({
                    id,
                    sourceName: newMetadata.sourceName,
                    previousVersion: mod.metadata.version,
                    version: newMetadata.version,
                });
                this.logger.info(COMPONENT, 'Updated module', {
                    source: newMetadata.sourceName,
                    version: newMetadata.version
                });
            }

            await this.persist();
            return summary;
        });
    }

    // Callers hold the mutex
    private async persist(): Promise<void> {
        const result = await this.store.write(Array.from(this.modules.values()));
        if (result.status === 'failed') {
            this.logger.error(COMPONENT, 'Failed to save modules', result.error);
        }
    }

    // Non-registry errors from a custom fetcher become FetchError
    private async request<T>(url: string, send: () => Promise<T>): Promise<T> {
        try {
            return await send();
        } catch (error) {
            if (isRegistryError(error)) {
                throw error;
            }
            throw ErrorFactory.fetch(`GET ${url} failed: ${describeError(error)}`, { url, cause: error });
        }
    }

    private async fetchScript(url: string): Promise<Buffer> {
        return await this.request(url, () => this.fetcher.fetchBuffer(url));
    }

    private async fetchMetadata(url: string): Promise<ModuleMetadata> {
        const body = await this.request(url, () => this.fetcher.fetchText(url));

        let parsed: unknown;
        try {
            parsed = JSON.parse(body);
        } catch (error) {
            throw ErrorFactory.parse(`Metadata at ${url} is not valid JSON: ${describeError(error)}`, {
                operation: 'parseMetadata',
                url,
                cause: error
            });
        }

        const result = ModuleMetadataSchema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.issues
                .map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
                .join(', ');
            throw ErrorFactory.parse(`Metadata at ${url} has an unexpected shape: ${issues}`, {
                operation: 'parseMetadata',
                url
            });
        }
        return result.data;
    }
}
