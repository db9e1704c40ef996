import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { CONFIG } from '../../config/config';
import { ErrorFactory } from '../../core/errors';
import { hasErrorCode } from './fsErrors';

export type RemoveResult = 'removed' | 'missing';

/**
 * Flat-file cache of downloaded scripts, one file per module.
 */
export class ScriptCache {
    /**
     * A fresh random file name, e.g. `0b6f...e1.js`.
     */
    public static newFileName(): string {
        return uuidv4() + CONFIG.REGISTRY.SCRIPT_EXTENSION;
    }

    /**
     * Writes the script bytes verbatim, replacing any previous file.
     */
    public static async write(storageDir: string, fileName: string, body: Buffer): Promise<void> {
        const scriptPath = path.join(storageDir, fileName);
        try {
            await fs.writeFile(scriptPath, body, { mode: 0o644 });
        } catch (error) {
            throw ErrorFactory.io(`Failed to write script ${scriptPath}`, {
                operation: 'writeScript',
                path: scriptPath,
                cause: error
            });
        }
    }

    public static async read(storageDir: string, fileName: string): Promise<string> {
        const scriptPath = path.join(storageDir, fileName);
        try {
            return await fs.readFile(scriptPath, 'utf8');
        } catch (error) {
            throw ErrorFactory.io(`Failed to read script ${scriptPath}`, {
                operation: 'readScript',
                path: scriptPath,
                cause: error,
                suggestion: hasErrorCode(error, 'ENOENT')
                    ? 'The cached script was removed outside the registry; delete and re-add the module'
                    : undefined
            });
        }
    }

    /**
     * Removes a cached script. A file that is already gone is not an error.
     */
    public static async remove(storageDir: string, fileName: string): Promise<RemoveResult> {
        const scriptPath = path.join(storageDir, fileName);
        try {
            await fs.unlink(scriptPath);
            return 'removed';
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) {
                return 'missing';
            }
            throw ErrorFactory.io(`Failed to delete script ${scriptPath}`, {
                operation: 'removeScript',
                path: scriptPath,
                cause: error
            });
        }
    }
}
