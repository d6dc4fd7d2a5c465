/**
 * Structured Logger for overlay-forge
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when OVERLAY_LOG_JSON=1
 * - Optional file output via OVERLAY_LOG_FILE
 * - Component name on every line
 * - Build correlation (build id, stage, overlay package) stamped on every entry
 *
 * Environment:
 *   OVERLAY_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   OVERLAY_LOG_JSON   = 1 (default: text)
 *   OVERLAY_LOG_FILE   = path (optional, appends)
 *   OVERLAY_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const v = (raw || 'info').toLowerCase();
    return v === 'debug' || v === 'warn' || v === 'error' ? v : 'info';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.OVERLAY_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.OVERLAY_DEBUG === '1' || process.env.OVERLAY_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.OVERLAY_LOG_JSON === '1';
const LOG_FILE = process.env.OVERLAY_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Build Correlation Context                                                  */
/* -------------------------------------------------------------------------- */

let _buildId: string = '';
let _stage: string = '';
let _target: string = '';

/** Set the active build correlation context. Called by the pipeline at build start. */
export function setCorrelation(opts: { buildId?: string; stage?: string; target?: string }): void {
    if (opts.buildId !== undefined) _buildId = opts.buildId;
    if (opts.stage !== undefined) _stage = opts.stage;
    if (opts.target !== undefined) _target = opts.target;
}

export function clearCorrelation(): void {
    _buildId = '';
    _stage = '';
    _target = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_buildId) entry.build_id = _buildId;
        if (_stage) entry.stage = _stage;
        if (_target) entry.target = _target;
        if (data) entry.data = data;
        writeOutput(JSON.stringify(entry));
    } else {
        const ctx = _buildId ? ` [${_buildId.slice(0, 8)}${_stage ? ':' + _stage : ''}${_target ? '/' + _target : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(line);
    }
}

function writeOutput(line: string): void {
    // Every level goes to stderr; stdout carries only CLI results
    process.stderr.write(line + '\n');

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${e instanceof Error ? e.message : String(e)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
