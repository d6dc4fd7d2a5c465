// src/overlay/atomic_publish.ts

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

type FsyncMode = 'BEST_EFFORT' | 'REQUIRED';

function errnoCode(e: unknown): string | undefined {
    if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
    return undefined;
}

function isFatalBestEffort(code?: string): boolean {
    return code === 'ENOSPC' || code === 'EIO';
}

/** Temp path next to `finalPath`, so the closing rename never crosses filesystems. */
export function tempPathFor(finalPath: string): string {
    return `${finalPath}.tmp.${crypto.randomBytes(4).toString('hex')}`;
}

function fsyncPath(p: string, flags: string, fsyncMode: FsyncMode, warnings: string[]): void {
    try {
        const fd = fs.openSync(p, flags);
        try {
            fs.fsyncSync(fd);
        } finally {
            fs.closeSync(fd);
        }
    } catch (e) {
        const code = errnoCode(e);
        if (fsyncMode === 'REQUIRED' || isFatalBestEffort(code)) throw e;
        warnings.push(`FSYNC_WARN(${code || 'UNKNOWN'}) on ${p}`);
    }
}

/**
 * Moves a finished file onto `finalPath` so readers only ever see the old
 * artifact or the complete new one. `tmpPath` must sit in the same directory.
 * On failure the temp file is removed and the error rethrown.
 */
export function publishFileSync(params: {
    tmpPath: string;
    finalPath: string;
    mode?: number;
    fsyncMode: FsyncMode;
    warnings: string[];
}): void {
    const { tmpPath, finalPath, fsyncMode, warnings } = params;
    const dir = path.dirname(finalPath);

    try {
        fsyncPath(tmpPath, 'r+', fsyncMode, warnings);
        fs.renameSync(tmpPath, finalPath);
        if (params.mode !== undefined) fs.chmodSync(finalPath, params.mode);
        fsyncPath(dir, 'r', fsyncMode, warnings);
    } catch (e) {
        fs.rmSync(tmpPath, { force: true });
        throw e;
    }
}
