/**
 * Main entry point - exports all public APIs
 */

export {
    PipelineOrchestrator,
    OrchestratorOptions,
    PipelineResult,
    ReportSink,
    bestRefinedScore,
} from './pipeline_orchestrator';
export { Session, SessionOptions, SessionSnapshot, SessionState, PrivacySummary, StageUsage, isTerminal } from './session';
export { PrivacyLedger, PrivacyBudgetConfig, PrivacyLedgerOptions, LedgerEntry, WrapOptions } from './privacy_ledger';
export { ContextStore, ContextStats } from './context_store';
export { RandomSource, cryptoRandom, createSeededRandom, laplaceScale, sampleLaplace, validatePrivacyParams } from './noise_engine';
export { SessionArchive, SessionArchiveOptions, ArchivedSessionSummary, EnvelopeIndexRow } from './session_archive';
export { KeyedMutex } from './session_lock';
export { evaluateStop, StopInput } from './stop_policy';
export {
    BackendRegistry,
    InferenceBackend,
    ModelConfig,
    FetchLike,
    OpenRouterBackend,
    OpenRouterBackendOptions,
    OllamaBackend,
    OllamaBackendOptions,
    inferWithTimeout,
    createDefaultRegistry,
    defaultModelConfig,
} from './inference';
export {
    WORKERS,
    runStage,
    StageContext,
    StageIO,
    StageWorker,
    WorkerTable,
    EvolutionResult,
    scoreHypothesis,
    aggregateScore,
    SCORE_WEIGHTS,
} from './stages';
export { SessionConfig, BudgetPolicy, DEFAULT_SESSION_CONFIG, resolveSessionConfig } from './config';
export * from './structured_error';
export * from './types';
export { createLogger, Logger, LogContext, LogLevel } from './logger';
export { ContextForgeCLI, parseSessionFlags } from './cli';
