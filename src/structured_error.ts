/**
 * Error taxonomy and structured error schema.
 *
 * Thrown errors are classes with a stable `code`. Anything that has to be
 * recorded (diagnostic envelopes, failed pipeline results, the archive) is
 * converted to a machine-readable StructuredError first.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Programmer / configuration errors
    | 'INVALID_PARAMETER'
    | 'INVALID_CONFIG'
    | 'INVALID_ENVELOPE'

    // Privacy
    | 'BUDGET_EXCEEDED'

    // Model output
    | 'MALFORMED_RESPONSE'

    // Backend
    | 'PROVIDER_ERROR'
    | 'TIMEOUT'

    // Session control
    | 'CANCELLED'
    | 'INVALID_STATE_TRANSITION'

    // Anything not raised by this package
    | 'INTERNAL_ERROR';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export type RecoveryAction =
    | 'retry_same_backend'
    | 'switch_to_fallback_backend'
    | 'continue_unprotected'
    | 'abort_session';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
}

export interface StructuredError {
    code: ErrorCode;
    name: string;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class ContextForgeError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: Record<string, unknown> = {},
        cause?: unknown
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'ContextForgeError';
    }
}

/** Bad privacy parameters (epsilon <= 0, negative sensitivity). Fatal at the call site. */
export class InvalidParameterError extends ContextForgeError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'INVALID_PARAMETER', context);
        this.name = 'InvalidParameterError';
    }
}

export class InvalidConfigError extends ContextForgeError {
    constructor(public readonly field: string, message: string) {
        super(`Invalid config '${field}': ${message}`, 'INVALID_CONFIG', { field });
        this.name = 'InvalidConfigError';
    }
}

export class InvalidEnvelopeError extends ContextForgeError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'INVALID_ENVELOPE', context);
        this.name = 'InvalidEnvelopeError';
    }
}

export class BudgetExceededError extends ContextForgeError {
    constructor(
        public readonly session_id: string,
        public readonly epsilon_budget: number,
        public readonly epsilon_spent: number,
        public readonly epsilon_requested: number
    ) {
        super(
            `Privacy budget exceeded: session=${session_id} budget=${epsilon_budget} spent=${epsilon_spent} requested=${epsilon_requested}`,
            'BUDGET_EXCEEDED',
            { session_id, epsilon_budget, epsilon_spent, epsilon_requested }
        );
        this.name = 'BudgetExceededError';
    }
}

export class MalformedResponseError extends ContextForgeError {
    constructor(
        public readonly stage: string,
        message: string,
        public readonly snippet: string = ''
    ) {
        super(`${stage}: ${message}`, 'MALFORMED_RESPONSE', { stage, snippet });
        this.name = 'MalformedResponseError';
    }
}

export class ProviderError extends ContextForgeError {
    constructor(
        public readonly backend: string,
        message: string,
        public readonly httpStatus: number | null = null,
        cause?: unknown
    ) {
        super(`${backend}: ${message}`, 'PROVIDER_ERROR', { backend, http_status: httpStatus }, cause);
        this.name = 'ProviderError';
    }
}

export class TimeoutError extends ContextForgeError {
    constructor(public readonly backend: string, public readonly timeoutMs: number) {
        super(`${backend}: inference timed out after ${timeoutMs}ms`, 'TIMEOUT', { backend, timeout_ms: timeoutMs });
        this.name = 'TimeoutError';
    }
}

export class CancelledError extends ContextForgeError {
    constructor(public readonly session_id: string, public readonly reason: string = 'Cancelled') {
        super(`Session ${session_id} cancelled: ${reason}`, 'CANCELLED', { session_id, reason });
        this.name = 'CancelledError';
    }
}

export class InvalidStateTransitionError extends ContextForgeError {
    constructor(public readonly session_id: string, public readonly from: string, public readonly to: string) {
        super(`Session ${session_id}: invalid transition ${from} -> ${to}`, 'INVALID_STATE_TRANSITION', { session_id, from, to });
        this.name = 'InvalidStateTransitionError';
    }
}

/* -------------------------------------------------------------------------- */
/* Classification                                                             */
/* -------------------------------------------------------------------------- */

/** Stage-local failures the orchestrator retries and then escalates to the fallback backend. */
export function isRetryable(err: unknown): boolean {
    return err instanceof MalformedResponseError
        || err instanceof ProviderError
        || err instanceof TimeoutError;
}

function getSeverity(code: ErrorCode): Severity {
    switch (code) {
        case 'INVALID_PARAMETER':
        case 'INVALID_CONFIG':
        case 'INVALID_ENVELOPE':
        case 'INVALID_STATE_TRANSITION':
        case 'BUDGET_EXCEEDED':
        case 'INTERNAL_ERROR':
            return 'FATAL';
        case 'CANCELLED':
            return 'WARNING';
        default:
            return 'ERROR';
    }
}

function recoveryOptionsFor(code: ErrorCode): RecoveryOption[] {
    switch (code) {
        case 'MALFORMED_RESPONSE':
        case 'PROVIDER_ERROR':
        case 'TIMEOUT':
            return [
                { action: 'retry_same_backend', description: 'Retry the stage against the same backend' },
                { action: 'switch_to_fallback_backend', description: 'Retry the stage against the fallback backend' },
            ];
        case 'BUDGET_EXCEEDED':
            return [
                { action: 'abort_session', description: 'Stop the session (default policy)' },
                { action: 'continue_unprotected', description: 'Store further handoffs without noise and record a warning' },
            ];
        default:
            return [{ action: 'abort_session', description: 'Stop the session' }];
    }
}

/* -------------------------------------------------------------------------- */
/* Builders                                                                   */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    name: string,
    message: string,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        name,
        message,
        severity: getSeverity(code),
        context,
        recovery_options: recoveryOptionsFor(code),
        timestamp: new Date().toISOString(),
    };
}

export function toStructuredError(err: unknown): StructuredError {
    if (err instanceof ContextForgeError) {
        return createStructuredError(err.code, err.name, err.message, { ...err.context });
    }
    if (err instanceof Error) {
        return createStructuredError('INTERNAL_ERROR', err.name, err.message);
    }
    return createStructuredError('INTERNAL_ERROR', 'Error', String(err));
}

/* -------------------------------------------------------------------------- */
/* Snippet sanitizing                                                         */
/* -------------------------------------------------------------------------- */

const SNIPPET_MAX_CHARS = 500;

const STRIP_PATTERNS: RegExp[] = [
    /\b\d{1,3}(?:\.\d{1,3}){3}\b/g,
    /[a-fA-F0-9]{32,}/g,
    /sk-[A-Za-z0-9-]{10,}/g,
    /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
];

/** Strips credentials and addresses from provider text before it is logged or stored. */
export function sanitizeSnippet(input: string): string {
    let out = input || '';
    for (const re of STRIP_PATTERNS) {
        out = out.replace(re, '[REDACTED]');
    }
    if (out.length > SNIPPET_MAX_CHARS) {
        out = out.slice(0, SNIPPET_MAX_CHARS);
    }
    return out.replace(/[^\x20-\x7E]+/g, ' ');
}
