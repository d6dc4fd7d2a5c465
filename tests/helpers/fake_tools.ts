// In-process stand-ins for aapt, zipalign and apksigner.

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import type { ToolInvoker, ToolRunOptions, ToolRunResult } from '../../src/tool_invoker';

export const AAPT = '/fake/bin/aapt';
export const ZIPALIGN = '/fake/bin/zipalign';
export const APKSIGNER = '/fake/bin/apksigner';

export interface RecordedCall {
    executable: string;
    args: string[];
    env: Record<string, string>;
}

/** Returns a partial result; anything left out defaults to a clean exit. */
export type ToolHandler = (args: readonly string[], callIndex: number) => Partial<ToolRunResult> | void;

export class ScriptedInvoker implements ToolInvoker {
    readonly calls: RecordedCall[] = [];

    constructor(private readonly handlers: Record<string, ToolHandler> = {}) {}

    run(executablePath: string, args: readonly string[], options: ToolRunOptions = {}): ToolRunResult {
        const callIndex = this.callsTo(executablePath).length;
        this.calls.push({ executable: executablePath, args: [...args], env: { ...options.env } });
        const handler = this.handlers[executablePath];
        const partial = handler ? handler(args, callIndex) : undefined;
        return { exitCode: 0, stderrLines: [], stdout: '', timedOut: false, ...(partial ?? {}) };
    }

    callsTo(executablePath: string): RecordedCall[] {
        return this.calls.filter(c => c.executable === executablePath);
    }
}

export function argAfter(args: readonly string[], flag: string): string {
    const index = args.indexOf(flag);
    const value = args[index + 1];
    if (index === -1 || value === undefined) {
        throw new Error(`missing ${flag} in ${args.join(' ')}`);
    }
    return value;
}

export function allArgsAfter(args: readonly string[], flag: string): string[] {
    const values: string[] = [];
    args.forEach((a, i) => {
        if (a === flag && args[i + 1] !== undefined) values.push(args[i + 1]);
    });
    return values;
}

/** aapt that writes the archive named by -F */
export const aaptWritesArchive: ToolHandler = args => {
    fs.writeFileSync(argAfter(args, '-F'), 'unsigned-apk');
};

/** zipalign `-f 4 <in> <out>` that copies its input */
export const zipalignCopies: ToolHandler = args => {
    fs.copyFileSync(args[2], args[3]);
};

/** apksigner that writes the file named by --out */
export const apksignerSigns: ToolHandler = args => {
    fs.writeFileSync(argAfter(args, '--out'), 'signed-apk');
};

export function happyTools(): Record<string, ToolHandler> {
    return {
        [AAPT]: aaptWritesArchive,
        [ZIPALIGN]: zipalignCopies,
        [APKSIGNER]: apksignerSigns,
    };
}

export function makeSandbox(prefix: string): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeSandbox(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
