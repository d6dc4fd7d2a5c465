/**
 * Resolves build tool names to executable paths on the search path.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LRUCache } from 'lru-cache';
import { createLogger } from './logger';

const log = createLogger('tool-locator');

function isExecutableFile(candidate: string): boolean {
    try {
        fs.accessSync(candidate, fs.constants.X_OK);
        return fs.statSync(candidate).isFile();
    } catch {
        return false;
    }
}

/**
 * Walks a search path in order and returns the first directory entry named
 * `name` that is an executable file.
 */
export function findExecutableOnPath(
    name: string,
    pathVar: string | undefined,
    delimiter: string = path.delimiter
): string | null {
    if (!pathVar) return null;
    for (const dir of pathVar.split(delimiter)) {
        if (!dir) continue;
        const candidate = path.join(dir, name);
        if (isExecutableFile(candidate)) return candidate;
    }
    return null;
}

export interface ToolLocatorOptions {
    pathVar?: string;
    cacheSize?: number;
}

export class ToolLocator {
    private readonly pathVar: string | undefined;
    private readonly cache: LRUCache<string, string>;

    constructor(options: ToolLocatorOptions = {}) {
        this.pathVar = options.pathVar ?? process.env.PATH;
        this.cache = new LRUCache<string, string>({ max: options.cacheSize ?? 32 });
    }

    /**
     * Paths (anything containing a separator) are returned as given. Bare
     * names are looked up on the search path; a name that cannot be found is
     * returned unchanged so the spawn error surfaces from the invoker.
     */
    resolve(nameOrPath: string): string {
        if (nameOrPath.includes('/') || nameOrPath.includes(path.sep)) {
            return nameOrPath;
        }

        const cached = this.cache.get(nameOrPath);
        if (cached !== undefined) return cached;

        const found = findExecutableOnPath(nameOrPath, this.pathVar);
        if (found === null) {
            log.warn(`Tool not found on PATH: ${nameOrPath}`);
            return nameOrPath;
        }

        log.debug('Resolved tool', { name: nameOrPath, path: found });
        this.cache.set(nameOrPath, found);
        return found;
    }
}
