/**
 * CLI Entry Point for ContextForge
 *
 *   contextforge analyze <file...> [options]   run the pipeline over text documents
 *   contextforge show <session_id> --archive <path>
 *   contextforge list --archive <path>
 */

import * as fs from 'fs';
import { SessionConfig } from './config';
import { BackendRegistry, createDefaultRegistry } from './inference';
import { PipelineOrchestrator, PipelineResult } from './pipeline_orchestrator';
import { Session } from './session';
import { SessionArchive } from './session_archive';
import { ContextForgeError } from './structured_error';

/** Flags that take a value; everything else starting with -- is a switch. */
const VALUE_FLAGS = new Set([
    '--budget',
    '--epsilon',
    '--cycles',
    '--convergence',
    '--timeout',
    '--retries',
    '--primary',
    '--fallback',
    '--target',
    '--archive',
]);

export interface CliOptions {
    backends?: BackendRegistry;
    out?: (line: string) => void;
    err?: (line: string) => void;
}

class UsageError extends Error {}

function flagValue(args: string[], flag: string): string | undefined {
    const i = args.indexOf(flag);
    if (i === -1) return undefined;
    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${flag} requires a value`);
    }
    return value;
}

function positionals(args: string[]): string[] {
    const out: string[] = [];
    for (let i = 0; i < args.length; i++) {
        if (args[i].startsWith('--')) {
            if (VALUE_FLAGS.has(args[i])) i++;
            continue;
        }
        out.push(args[i]);
    }
    return out;
}

function numberFlag(args: string[], flag: string): number | undefined {
    const raw = flagValue(args, flag);
    if (raw === undefined) return undefined;
    const n = Number(raw);
    if (raw.trim() === '' || Number.isNaN(n)) {
        throw new UsageError(`${flag} expects a number, got '${raw}'`);
    }
    return n;
}

/** Session overrides from command-line flags; validation happens in resolveSessionConfig. */
export function parseSessionFlags(args: string[]): Partial<SessionConfig> {
    const overrides: Partial<SessionConfig> = {};

    const budget = flagValue(args, '--budget');
    if (budget !== undefined) {
        overrides.epsilon_budget = budget.toLowerCase() === 'unbounded' ? Infinity : Number(budget);
        if (Number.isNaN(overrides.epsilon_budget)) {
            throw new UsageError(`--budget expects a number or 'unbounded', got '${budget}'`);
        }
    }
    const epsilon = numberFlag(args, '--epsilon');
    if (epsilon !== undefined) overrides.handoff_epsilon = epsilon;
    const cycles = numberFlag(args, '--cycles');
    if (cycles !== undefined) overrides.max_evolution_cycles = cycles;
    const convergence = numberFlag(args, '--convergence');
    if (convergence !== undefined) overrides.convergence_threshold = convergence;
    const timeout = numberFlag(args, '--timeout');
    if (timeout !== undefined) overrides.per_stage_timeout_ms = timeout;
    const retries = numberFlag(args, '--retries');
    if (retries !== undefined) overrides.retry_count = retries;
    const target = numberFlag(args, '--target');
    if (target !== undefined) overrides.target_score = target;

    const primary = flagValue(args, '--primary');
    if (primary !== undefined) overrides.primary_backend = primary;
    const fallback = flagValue(args, '--fallback');
    if (fallback !== undefined) overrides.fallback_backend = fallback.toLowerCase() === 'none' ? null : fallback;

    if (args.includes('--continue-unprotected')) overrides.on_budget_exceeded = 'continue_unprotected';
    return overrides;
}

function formatBudget(budget: number | null): string {
    return budget === null ? 'unbounded' : String(budget);
}

export class ContextForgeCLI {
    private readonly backends: BackendRegistry | undefined;
    private readonly out: (line: string) => void;
    private readonly err: (line: string) => void;

    constructor(options: CliOptions = {}) {
        this.backends = options.backends;
        this.out = options.out ?? ((line) => console.log(line));
        this.err = options.err ?? ((line) => console.error(line));
    }

    /** Runs one command; resolves with the process exit code. */
    async run(argv: string[]): Promise<number> {
        const command = argv[2] || 'help';
        const args = argv.slice(3);

        try {
            switch (command) {
                case 'analyze':
                    return await this.runAnalyze(args);
                case 'show':
                    return this.runShow(args);
                case 'list':
                    return this.runList(args);
                case 'help':
                case '--help':
                    this.showHelp();
                    return 0;
                default:
                    this.err(`Error: unknown command '${command}'`);
                    this.showHelp();
                    return 1;
            }
        } catch (e) {
            if (e instanceof UsageError || e instanceof ContextForgeError) {
                this.err(`Error: ${e.message}`);
                return 1;
            }
            throw e;
        }
    }

    private async runAnalyze(args: string[]): Promise<number> {
        const files = positionals(args);
        if (files.length === 0) {
            throw new UsageError('analyze needs at least one document file');
        }
        const documents = files.map((f) => {
            if (!fs.existsSync(f)) throw new UsageError(`file not found: ${f}`);
            return fs.readFileSync(f, 'utf-8');
        });

        const session = new Session({ config: parseSessionFlags(args) });
        const archivePath = flagValue(args, '--archive');
        const archive = archivePath === undefined ? null : new SessionArchive(archivePath);

        let result: PipelineResult;
        try {
            const orchestrator = new PipelineOrchestrator({
                backends: this.backends ?? createDefaultRegistry(),
                sinks: archive ? [archive] : [],
            });
            result = await orchestrator.run(session, documents);
        } finally {
            archive?.close();
        }

        if (args.includes('--json')) {
            this.out(JSON.stringify({
                session_id: result.session_id,
                status: result.status,
                stop_reason: result.stop_reason,
                cycles: result.cycles,
                best_score: result.best_score,
                hypotheses: result.hypotheses,
                privacy: result.snapshot.privacy,
                error: result.error,
            }, null, 2));
        } else {
            this.printResult(result);
        }
        return result.status === 'Finalized' ? 0 : 1;
    }

    private printResult(result: PipelineResult): void {
        const privacy = result.snapshot.privacy;
        if (result.status === 'Finalized') {
            this.out(`Session ${result.session_id}: Finalized (${result.stop_reason} after ${result.cycles} cycle(s))`);
        } else {
            this.out(`Session ${result.session_id}: Failed (${result.error?.code}: ${result.error?.message})`);
        }
        this.out(`Privacy: epsilon spent ${privacy.epsilon_spent} of ${formatBudget(privacy.epsilon_budget)} over ${privacy.charges} handoff(s)`);

        if (result.hypotheses.length > 0) {
            this.out('Hypotheses:');
            result.hypotheses.forEach((h, i) => {
                const score = h.score ? `[${h.score.aggregate.toFixed(2)}] ` : '';
                this.out(`  ${i + 1}. ${score}${h.text}`);
                if (h.methodology) this.out(`     Methodology: ${h.methodology}`);
            });
        }
    }

    private openArchive(args: string[]): SessionArchive {
        const archivePath = flagValue(args, '--archive');
        if (archivePath === undefined) throw new UsageError('--archive <path> is required');
        if (!fs.existsSync(archivePath)) throw new UsageError(`archive not found: ${archivePath}`);
        return new SessionArchive(archivePath);
    }

    private runShow(args: string[]): number {
        const [sessionId] = positionals(args);
        if (!sessionId) throw new UsageError('show needs a session id');

        const archive = this.openArchive(args);
        try {
            const snapshot = archive.load(sessionId);
            if (!snapshot) {
                this.err(`Error: session ${sessionId} not found`);
                return 1;
            }
            if (args.includes('--json')) {
                this.out(JSON.stringify(snapshot, null, 2));
                return 0;
            }

            this.out(`Session ${snapshot.session_id}: ${snapshot.state}${snapshot.stop_reason ? ` (${snapshot.stop_reason})` : ''}`);
            this.out(`Cycles: ${snapshot.cycle}`);
            this.out(`Privacy: epsilon spent ${snapshot.privacy.epsilon_spent} of ${formatBudget(snapshot.privacy.epsilon_budget)}`);
            this.out('History:');
            for (const row of archive.envelopeIndex(sessionId)) {
                const tag = row.kind === 'diagnostic' ? ` [${row.event ?? 'diagnostic'}]` : '';
                const noise = row.applied ? `eps=${row.epsilon}` : 'unprotected';
                this.out(`  ${row.seq}. ${row.sender} -> ${row.receiver}${tag} ${noise}`);
            }
            return 0;
        } finally {
            archive.close();
        }
    }

    private runList(args: string[]): number {
        const archive = this.openArchive(args);
        try {
            const sessions = archive.list();
            if (sessions.length === 0) {
                this.out('No archived sessions.');
                return 0;
            }
            for (const s of sessions) {
                this.out(`${s.session_id}  ${s.state.padEnd(9)}  cycles=${s.cycles}  envelopes=${s.envelopes}  eps=${s.epsilon_spent}  ${s.archived_at}`);
            }
            return 0;
        } finally {
            archive.close();
        }
    }

    private showHelp(): void {
        this.out(`
ContextForge - privacy-accounted research hypothesis pipeline

Usage:
  contextforge analyze <file...> [options]
  contextforge show <session_id> --archive <path> [--json]
  contextforge list --archive <path>

Analyze options:
  --budget <eps|unbounded>   Session privacy budget (default: unbounded)
  --epsilon <eps>            Epsilon charged per handoff (default: 1.0)
  --continue-unprotected     On budget exhaustion keep going without noise instead of failing
  --cycles <n>               Max evolution cycles, 1-5 (default: 3)
  --convergence <x>          Minimum score gain per cycle (default: 0.01)
  --target <score>           Stop once the best score reaches this value
  --timeout <ms>             Per-stage model call timeout
  --retries <n>              Retries per backend (default: 2)
  --primary <id>             Primary backend: openrouter | ollama
  --fallback <id|none>       Fallback backend
  --archive <path>           Archive the session to this SQLite file
  --json                     Machine-readable output

Environment:
  OPENROUTER_API_KEY         API key for the openrouter backend
  CONTEXTFORGE_LOG_LEVEL     debug | info | warn | error | silent
`);
    }
}

if (require.main === module) {
    const cli = new ContextForgeCLI();
    cli.run(process.argv)
        .then((code) => {
            process.exitCode = code;
        })
        .catch((err: unknown) => {
            console.error('Fatal error:', err);
            process.exit(1);
        });
}
