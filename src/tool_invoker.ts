/**
 * Tool Invoker — runs external build tools synchronously.
 *
 * Callers judge the outcome by the files a tool leaves behind and by its
 * stderr text, so this layer only reports what happened and never throws
 * for a non-zero exit.
 */

import { spawnSync } from 'child_process';
import { createLogger } from './logger';
import { TIMEOUTS } from './config';

const log = createLogger('tool-invoker');

export interface ToolRunResult {
    /** null when the process could not be started or was killed */
    exitCode: number | null;
    stderrLines: string[];
    stdout: string;
    timedOut: boolean;
}

export interface ToolRunOptions {
    /** Added to the invoker's environment for this run only; never logged. */
    env?: Readonly<Record<string, string>>;
}

export interface ToolInvoker {
    run(executablePath: string, args: readonly string[], options?: ToolRunOptions): ToolRunResult;
}

const SECRET_ARG = /^pass:[\s\S]*/;

/** Argument list safe to log: inline `pass:<secret>` values are masked. */
export function redactArgs(args: readonly string[]): string[] {
    return args.map(a => a.replace(SECRET_ARG, 'pass:***'));
}

/** Split captured stream text into lines, dropping the empty tail after a final newline. */
export function splitLines(text: string): string[] {
    if (!text) return [];
    const lines = text.split(/\r?\n/);
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

export interface SpawnToolInvokerOptions {
    /** 0 disables the timeout: a hung tool then blocks the caller. */
    timeoutMs?: number;
    env?: NodeJS.ProcessEnv;
}

export class SpawnToolInvoker implements ToolInvoker {
    private readonly timeoutMs: number;
    private readonly env: NodeJS.ProcessEnv | undefined;

    constructor(options: SpawnToolInvokerOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? TIMEOUTS.TOOL_MS;
        this.env = options.env;
    }

    run(executablePath: string, args: readonly string[], options: ToolRunOptions = {}): ToolRunResult {
        log.debug('exec', {
            argv: [executablePath, ...redactArgs(args)],
            env_keys: Object.keys(options.env ?? {}),
        });

        const env = options.env ? { ...(this.env ?? process.env), ...options.env } : this.env;
        const res = spawnSync(executablePath, [...args], {
            encoding: 'utf8',
            env,
            timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
            maxBuffer: 64 * 1024 * 1024,
        });

        const timedOut = res.error !== undefined && 'code' in res.error && res.error.code === 'ETIMEDOUT';

        if (res.error) {
            log.error(`Failed to run ${executablePath}: ${res.error.message}`, { timedOut });
            return {
                exitCode: null,
                stderrLines: [...splitLines(res.stderr ?? ''), res.error.message],
                stdout: res.stdout ?? '',
                timedOut,
            };
        }

        const stderrLines = splitLines(res.stderr);
        log.debug('exit', { executable: executablePath, status: res.status, stderr_lines: stderrLines.length });

        return {
            exitCode: res.status,
            stderrLines,
            stdout: res.stdout,
            timedOut: false,
        };
    }
}
