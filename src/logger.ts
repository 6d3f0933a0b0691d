/**
 * Structured Logger
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when CONTEXTFORGE_LOG_JSON=1
 * - Optional file output via CONTEXTFORGE_LOG_FILE
 * - Module context (component name) on every line
 * - Session context (session id, stage, cycle) bound per logger instance
 *
 * Environment:
 *   CONTEXTFORGE_LOG_LEVEL  = debug|info|warn|error|silent (default: info)
 *   CONTEXTFORGE_LOG_JSON   = 1 (default: text)
 *   CONTEXTFORGE_LOG_FILE   = path (optional, appends)
 *   CONTEXTFORGE_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 };

function parseLevel(raw: string | undefined): number {
    const key = (raw || 'info').toLowerCase();
    if (key === 'debug' || key === 'info' || key === 'warn' || key === 'error' || key === 'silent') {
        return LEVEL_ORDER[key];
    }
    return LEVEL_ORDER.info;
}

const MIN_LEVEL: number = parseLevel(process.env.CONTEXTFORGE_LOG_LEVEL);
const DEBUG_OVERRIDE = process.env.CONTEXTFORGE_DEBUG === '1' || process.env.CONTEXTFORGE_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.CONTEXTFORGE_LOG_JSON === '1';
const LOG_FILE = process.env.CONTEXTFORGE_LOG_FILE || '';

let fileWriteFailed = false;

/* -------------------------------------------------------------------------- */
/* Session context                                                            */
/* -------------------------------------------------------------------------- */

/**
 * Context carried on every line a logger emits. Sessions run concurrently,
 * so this lives on the logger instance rather than in module state.
 */
export interface LogContext {
    session_id?: string;
    stage?: string;
    cycle?: number;
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, ctx: LogContext, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (ctx.session_id) entry.session_id = ctx.session_id;
        if (ctx.stage) entry.stage = ctx.stage;
        if (ctx.cycle !== undefined) entry.cycle = ctx.cycle;
        if (data) entry.data = data;
        writeOutput(JSON.stringify(entry));
    } else {
        const sid = ctx.session_id ? ctx.session_id.slice(0, 8) : '';
        const stage = ctx.stage ? `:${ctx.stage}` : '';
        const cycle = ctx.cycle !== undefined ? `#${ctx.cycle}` : '';
        const tag = sid ? ` [${sid}${stage}${cycle}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${tag}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(line);
    }
}

// Everything goes to stderr; stdout belongs to the CLI's own output (--json).
function writeOutput(line: string): void {
    process.stderr.write(line + '\n');

    if (LOG_FILE && !fileWriteFailed) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            // Report once, then stay on console only.
            fileWriteFailed = true;
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
    /** Returns a logger that stamps the given session context on every line. */
    with(ctx: LogContext): Logger;
}

export function createLogger(component: string, ctx: LogContext = {}): Logger {
    return {
        debug: (msg, data) => emit('debug', component, ctx, msg, data),
        info:  (msg, data) => emit('info',  component, ctx, msg, data),
        warn:  (msg, data) => emit('warn',  component, ctx, msg, data),
        error: (msg, data) => emit('error', component, ctx, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`, ctx),
        with: (next) => createLogger(component, { ...ctx, ...next }),
    };
}
