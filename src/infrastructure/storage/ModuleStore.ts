import { promises as fs } from 'fs';
import path from 'path';
import { CONFIG } from '../../config/config';
import { ErrorFactory, RegistryError } from '../../core/errors';
import { ModuleRecord, ModuleRecordListSchema } from '../../core/modules/types';
import { hasErrorCode } from './fsErrors';

export type LoadResult =
    | { status: 'loaded'; records: ModuleRecord[] }
    | { status: 'missing' }
    | { status: 'failed'; error: RegistryError };

export type SaveResult =
    | { status: 'saved' }
    | { status: 'failed'; error: RegistryError };

/**
 * ModuleStore
 * Reads and writes the modules.json snapshot of the registry.
 * Never throws: failures come back as a `failed` status for the caller to report.
 */
export class ModuleStore {
    public readonly filePath: string;

    constructor(storageDir: string) {
        this.filePath = path.join(storageDir, CONFIG.REGISTRY.MODULES_FILE_NAME);
    }

    public async read(): Promise<LoadResult> {
        let raw: string;
        try {
            raw = await fs.readFile(this.filePath, 'utf8');
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                return { status: 'missing' };
            }
            return {
                status: 'failed',
                error: ErrorFactory.io(`Failed to read ${this.filePath}`, {
                    operation: 'load',
                    path: this.filePath,
                    cause: error
                })
            };
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            return {
                status: 'failed',
                error: ErrorFactory.parse(`Malformed JSON in ${this.filePath}`, {
                    operation: 'load',
                    path: this.filePath,
                    cause: error
                })
            };
        }

        // A registry saved before its first add is written as `null`
        if (parsed === null) {
            return { status: 'loaded', records: [] };
        }

        const result = ModuleRecordListSchema.safeParse(parsed);
        if (!result.success) {
            const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ');
            return {
                status: 'failed',
                error: ErrorFactory.parse(`Invalid module records in ${this.filePath}: ${issues}`, {
                    operation: 'load',
                    path: this.filePath
                })
            };
        }

        return { status: 'loaded', records: result.data };
    }

    /**
     * Overwrites the snapshot in place. There is no write-then-rename step,
     * so a failed write can leave the file behind the in-memory list.
     */
    public async write(records: ModuleRecord[]): Promise<SaveResult> {
        let data: string;
        try {
            data = JSON.stringify(records, null, 2);
        } catch (error) {
            return {
                status: 'failed',
                error: ErrorFactory.parse('Failed to encode modules', { operation: 'save', cause: error })
            };
        }

        try {
            await fs.writeFile(this.filePath, data, { encoding: 'utf8', mode: 0o644 });
        } catch (error) {
            return {
                status: 'failed',
                error: ErrorFactory.io(`Failed to write ${this.filePath}`, {
                    operation: 'save',
                    path: this.filePath,
                    cause: error
                })
            };
        }

        return { status: 'saved' };
    }
}
