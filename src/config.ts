/**
 * Shared Configuration
 *
 * Defaults for a pipeline session. Values can be overridden via environment
 * variables; resolveSessionConfig() validates a caller's partial config on top.
 */

import { InvalidConfigError } from './structured_error';

export type BudgetPolicy = 'abort' | 'continue_unprotected';

export interface SessionConfig {
    /** Privacy ceiling for the session; Infinity = account only, never enforce. */
    epsilon_budget: number;
    /** Epsilon charged for each stage handoff. */
    handoff_epsilon: number;
    /** Laplace sensitivity used for each stage handoff. */
    handoff_sensitivity: number;
    on_budget_exceeded: BudgetPolicy;

    max_evolution_cycles: number;
    /** Minimum improvement of the best aggregate score between cycles; below it the loop stops. */
    convergence_threshold: number;
    /** Wall-clock budget for one evolution cycle; exceeding it stops the loop. */
    cycle_time_budget_ms: number;
    /** Stop as soon as the best aggregate reaches this score (null = disabled). */
    target_score: number | null;

    per_stage_timeout_ms: number;
    retry_count: number;
    primary_backend: string;
    fallback_backend: string | null;

    model: string;
    temperature: number;
    max_gaps: number;
}

function envFloat(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    if (raw.trim().toLowerCase() === 'unbounded') return Infinity;
    const n = parseFloat(raw);
    return Number.isNaN(n) ? fallback : n;
}

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isNaN(n) ? fallback : n;
}

/** 'none' disables the backend slot. */
function envBackend(name: string, fallback: string): string | null {
    const raw = (process.env[name] || '').trim();
    if (raw === '') return fallback;
    return raw.toLowerCase() === 'none' ? null : raw;
}

// Backends
export const DEFAULT_MODEL_ID = process.env.CONTEXTFORGE_MODEL || 'openai/gpt-4o-mini';
export const OPENROUTER_ENDPOINT = process.env.CONTEXTFORGE_OPENROUTER_URL || 'https://openrouter.ai/api/v1/chat/completions';
export const OLLAMA_BASE_URL = process.env.CONTEXTFORGE_OLLAMA_URL || 'http://localhost:11434';
export const OLLAMA_MODEL = process.env.CONTEXTFORGE_OLLAMA_MODEL || 'mistral';

// Limits
export const LIMITS = {
    MAX_EVOLUTION_CYCLES: 5,
    MAX_OUTPUT_TOKENS: envInt('CONTEXTFORGE_MAX_TOKENS', 2048),
    MAX_DOCUMENT_CHARS: 12_000,
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    STAGE_CALL_MS: envInt('CONTEXTFORGE_STAGE_TIMEOUT', 120_000),
    CYCLE_MS: envInt('CONTEXTFORGE_CYCLE_TIMEOUT', 300_000),
};

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
    epsilon_budget: envFloat('CONTEXTFORGE_EPSILON_BUDGET', Infinity),
    handoff_epsilon: envFloat('CONTEXTFORGE_HANDOFF_EPSILON', 1.0),
    handoff_sensitivity: envFloat('CONTEXTFORGE_HANDOFF_SENSITIVITY', 0.01),
    on_budget_exceeded: 'abort',

    max_evolution_cycles: envInt('CONTEXTFORGE_MAX_CYCLES', 3),
    convergence_threshold: envFloat('CONTEXTFORGE_CONVERGENCE', 0.01),
    cycle_time_budget_ms: TIMEOUTS.CYCLE_MS,
    target_score: null,

    per_stage_timeout_ms: TIMEOUTS.STAGE_CALL_MS,
    retry_count: envInt('CONTEXTFORGE_RETRY_COUNT', 2),
    primary_backend: process.env.CONTEXTFORGE_PRIMARY_BACKEND || 'openrouter',
    fallback_backend: envBackend('CONTEXTFORGE_FALLBACK_BACKEND', 'ollama'),

    model: DEFAULT_MODEL_ID,
    temperature: 0.7,
    max_gaps: 3,
};

/**
 * Fill defaults and validate. Throws InvalidConfigError on the first bad field.
 */
export function resolveSessionConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
    const cfg: SessionConfig = { ...DEFAULT_SESSION_CONFIG, ...overrides };

    if (Number.isNaN(cfg.epsilon_budget) || cfg.epsilon_budget <= 0) {
        throw new InvalidConfigError('epsilon_budget', `must be > 0 or Infinity, got ${cfg.epsilon_budget}`);
    }
    if (!Number.isFinite(cfg.handoff_epsilon) || cfg.handoff_epsilon <= 0) {
        throw new InvalidConfigError('handoff_epsilon', `must be a finite number > 0, got ${cfg.handoff_epsilon}`);
    }
    if (!Number.isFinite(cfg.handoff_sensitivity) || cfg.handoff_sensitivity < 0) {
        throw new InvalidConfigError('handoff_sensitivity', `must be a finite number >= 0, got ${cfg.handoff_sensitivity}`);
    }
    if (cfg.on_budget_exceeded !== 'abort' && cfg.on_budget_exceeded !== 'continue_unprotected') {
        throw new InvalidConfigError('on_budget_exceeded', `must be 'abort' or 'continue_unprotected'`);
    }
    if (!Number.isInteger(cfg.max_evolution_cycles) || cfg.max_evolution_cycles < 1 || cfg.max_evolution_cycles > LIMITS.MAX_EVOLUTION_CYCLES) {
        throw new InvalidConfigError('max_evolution_cycles', `must be an integer in 1..${LIMITS.MAX_EVOLUTION_CYCLES}, got ${cfg.max_evolution_cycles}`);
    }
    if (!Number.isFinite(cfg.convergence_threshold) || cfg.convergence_threshold < 0) {
        throw new InvalidConfigError('convergence_threshold', `must be a finite number >= 0, got ${cfg.convergence_threshold}`);
    }
    if (Number.isNaN(cfg.cycle_time_budget_ms) || cfg.cycle_time_budget_ms <= 0) {
        throw new InvalidConfigError('cycle_time_budget_ms', `must be > 0, got ${cfg.cycle_time_budget_ms}`);
    }
    if (cfg.target_score !== null && (!Number.isFinite(cfg.target_score) || cfg.target_score < 0 || cfg.target_score > 1)) {
        throw new InvalidConfigError('target_score', `must be null or in [0, 1], got ${cfg.target_score}`);
    }
    if (!Number.isFinite(cfg.per_stage_timeout_ms) || cfg.per_stage_timeout_ms <= 0) {
        throw new InvalidConfigError('per_stage_timeout_ms', `must be > 0, got ${cfg.per_stage_timeout_ms}`);
    }
    if (!Number.isInteger(cfg.retry_count) || cfg.retry_count < 0) {
        throw new InvalidConfigError('retry_count', `must be an integer >= 0, got ${cfg.retry_count}`);
    }
    if (!cfg.primary_backend) {
        throw new InvalidConfigError('primary_backend', 'must be set');
    }
    if (cfg.fallback_backend === cfg.primary_backend) {
        throw new InvalidConfigError('fallback_backend', 'must differ from primary_backend');
    }
    if (!Number.isInteger(cfg.max_gaps) || cfg.max_gaps < 1) {
        throw new InvalidConfigError('max_gaps', `must be an integer >= 1, got ${cfg.max_gaps}`);
    }
    if (!Number.isFinite(cfg.temperature) || cfg.temperature < 0 || cfg.temperature > 2) {
        throw new InvalidConfigError('temperature', `must be in [0, 2], got ${cfg.temperature}`);
    }

    return cfg;
}
