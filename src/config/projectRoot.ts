import fs from 'fs';
import path from 'path';

/**
 * Nearest ancestor of `start` holding a package.json. Resolves the same
 * directory from src/ under ts-jest and from dist/src/ after a build.
 */
export function findProjectRoot(start: string = __dirname): string {
    let dir = start;
    while (!fs.existsSync(path.join(dir, 'package.json'))) {
        const parent = path.dirname(dir);
        if (parent === dir) {
            return start;
        }
        dir = parent;
    }
    return dir;
}
