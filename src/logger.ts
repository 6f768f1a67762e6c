/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when RTLFORGE_LOG_JSON=1
 * - Optional file output via RTLFORGE_LOG_FILE
 * - Component name on every line
 * - Run correlation (run id + module under verification) on every entry
 *
 * Environment:
 *   RTLFORGE_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   RTLFORGE_LOG_JSON   = 1 (default: text)
 *   RTLFORGE_LOG_FILE   = path (optional, appends)
 *   RTLFORGE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';
import { AsyncLocalStorage } from 'async_hooks';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const value = (raw || 'info').toLowerCase();
    return value === 'debug' || value === 'warn' || value === 'error' ? value : 'info';
}

const DEBUG_OVERRIDE = process.env.RTLFORGE_DEBUG === '1' || process.env.RTLFORGE_DEBUG === 'true';
let effectiveMin: number = DEBUG_OVERRIDE ? 0 : LEVEL_ORDER[parseLevel(process.env.RTLFORGE_LOG_LEVEL)];

const JSON_MODE = process.env.RTLFORGE_LOG_JSON === '1';
const LOG_FILE = process.env.RTLFORGE_LOG_FILE || '';

/** Override the minimum level at runtime (CLI --verbose, tests). */
export function setLogLevel(level: LogLevel): void {
    effectiveMin = LEVEL_ORDER[level];
}

export function getLogLevel(): LogLevel {
    return LEVELS[effectiveMin] ?? 'info';
}

/* -------------------------------------------------------------------------- */
/* Run Correlation Context                                                    */
/* -------------------------------------------------------------------------- */

let _runId = '';
const moduleScope = new AsyncLocalStorage<string>();

/** Set the active run correlation. Called by the orchestrator at run start. */
export function setCorrelation(opts: { runId?: string }): void {
    if (opts.runId !== undefined) _runId = opts.runId;
}

export function clearCorrelation(): void {
    _runId = '';
}

/**
 * Tag every entry logged inside `fn` (and anything it awaits) with the
 * module under verification. Scoped per async chain, so parallel nodes
 * keep their own tag.
 */
export function withModuleCorrelation<T>(module: string, fn: () => Promise<T>): Promise<T> {
    return moduleScope.run(module, fn);
}

export function currentCorrelation(): { runId: string; module: string } {
    return { runId: _runId, module: moduleScope.getStore() ?? '' };
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < effectiveMin) return;

    const ts = new Date().toISOString();
    const _module = moduleScope.getStore() ?? '';

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (_module) entry.module = _module;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const tag = [_runId.slice(0, 8), _module].filter(Boolean).join('/');
        const ctx = tag ? ` [${tag}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error':
        case 'warn':
            process.stderr.write(line + '\n');
            break;
        default:
            process.stdout.write(line + '\n');
            break;
    }

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
