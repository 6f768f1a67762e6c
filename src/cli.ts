#!/usr/bin/env node
/**
 * CLI entry point: `rtlforge design "<prompt>"`, `rtlforge show <run-id>`,
 * `rtlforge check`
 */

import * as path from 'path';
import { loadRunConfig, Provider, RunConfig } from './config';
import { createLogger, setLogLevel } from './logger';
import { ConfigError, LedgerError, errorMessage } from './structured_error';
import { FetchFn, ModelRouter } from './model_router';
import { RouterGenerationClient } from './generation_client';
import { PlanBuilder } from './plan_builder';
import { getSystemPrompt } from './prompts';
import { ModuleGenerator } from './module_generator';
import { ModuleVerifier } from './module_verifier';
import { IcarusVerificationRunner } from './verification_runner';
import { CachingVerificationRunner } from './verification_cache';
import { DesignOrchestrator, OrchestratorHooks } from './orchestrator';
import { renderHierarchy } from './design_composer';
import { RunLedger } from './run_ledger';
import { checkBackend, formatCheckReport } from './backend_check';
import { diffAttempts } from './attempt_diff';
import { DesignWriter } from './output_writer';
import type { Attempt, DesignRequest, DesignResult, ModuleResult } from './design_types';

const log = createLogger('cli');

export const EXIT = {
    VERIFIED: 0,
    FAILED: 1,
    USAGE: 2,
} as const;

export interface DesignArgs {
    prompt: string;
    model?: string;
    provider?: Provider;
    maxRetries?: number;
    configPath?: string;
    parallel?: number;
    top?: string;
    save: boolean;
}

export type ParsedArgs = { ok: true; value: DesignArgs } | { ok: false; error: string };

/** Options accepted by every command, removed before the command parses its own. */
export function extractGlobalFlags(argv: readonly string[]): { argv: string[]; verbose: boolean } {
    const rest = argv.filter(a => a !== '--verbose');
    return { argv: rest, verbose: rest.length !== argv.length };
}

const VALUE_FLAGS = new Set(['--model', '--provider', '--max-retries', '--config', '--parallel', '--top']);

function positiveInt(flag: string, raw: string): number | string {
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 1) return `${flag} expects a positive integer, got "${raw}"`;
    return n;
}

export function parseDesignArgs(args: readonly string[]): ParsedArgs {
    const positional: string[] = [];
    const value: DesignArgs = { prompt: '', save: true };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '--no-save') {
            value.save = false;
            continue;
        }
        if (!arg.startsWith('--')) {
            positional.push(arg);
            continue;
        }
        if (!VALUE_FLAGS.has(arg)) return { ok: false, error: `Unknown option: ${arg}` };

        const raw = args[i + 1];
        if (raw === undefined || raw.startsWith('--')) return { ok: false, error: `${arg} requires a value` };
        i++;

        switch (arg) {
            case '--model':
                value.model = raw;
                break;
            case '--provider':
                if (raw !== 'ollama' && raw !== 'openrouter') {
                    return { ok: false, error: `Invalid provider: ${raw} (expected ollama or openrouter)` };
                }
                value.provider = raw;
                break;
            case '--max-retries': {
                const n = positiveInt(arg, raw);
                if (typeof n === 'string') return { ok: false, error: n };
                value.maxRetries = n;
                break;
            }
            case '--parallel': {
                const n = positiveInt(arg, raw);
                if (typeof n === 'string') return { ok: false, error: n };
                value.parallel = n;
                break;
            }
            case '--config':
                value.configPath = raw;
                break;
            case '--top':
                value.top = raw;
                break;
        }
    }

    if (positional.length === 0 || positional.join(' ').trim() === '') {
        return { ok: false, error: 'A design prompt is required' };
    }
    if (positional.length > 1) {
        return { ok: false, error: `Unexpected argument: ${positional[1]} (quote the prompt)` };
    }
    value.prompt = positional[0].trim();
    return { ok: true, value };
}

/* -------------------------------------------------------------------------- */
/* Output                                                                     */
/* -------------------------------------------------------------------------- */

export function formatAttemptLine(module: string, attempt: Attempt, maxRetries: number): string {
    const head = `  [${module}] attempt ${attempt.index}/${maxRetries}: ${attempt.outcome.status}`;
    if (attempt.outcome.status === 'PASSED') {
        return `${head} (${attempt.outcome.vectorsPassed} vectors)`;
    }
    return attempt.diagnosis ? `${head} (${attempt.diagnosis.category})` : head;
}

export function formatResultSummary(result: DesignResult): string[] {
    const lines = [`Result: ${result.status} (run ${result.runId}, ${(result.durationMs / 1000).toFixed(1)}s)`];
    switch (result.status) {
        case 'VERIFIED':
            lines.push(`  Top module: ${result.design.top}`);
            lines.push(`  Modules: ${result.design.modules.map(m => m.name).join(', ')}`);
            break;
        case 'PARTIALLY_FAILED':
            for (const f of result.failed) lines.push(`  Failed: ${f.name} - ${f.reason}`);
            if (result.skipped.length > 0) lines.push(`  Skipped: ${result.skipped.join(', ')}`);
            break;
        case 'ABORTED':
            lines.push(`  Reason: ${result.reason}`);
            if (result.aborted.length > 0) lines.push(`  Aborted: ${result.aborted.join(', ')}`);
            if (result.skipped.length > 0) lines.push(`  Skipped: ${result.skipped.join(', ')}`);
            break;
    }
    return lines;
}

/* -------------------------------------------------------------------------- */
/* CLI                                                                        */
/* -------------------------------------------------------------------------- */

/**
 * Open the run ledger for a design run. An unusable ledger is logged and
 * the run goes ahead unrecorded.
 */
export function openLedger(dbPath: string): RunLedger | null {
    try {
        return new RunLedger(dbPath);
    } catch (err) {
        if (!(err instanceof LedgerError)) throw err;
        log.warn(`Ledger unavailable, run will not be recorded`, { path: dbPath, error: err.message });
        return null;
    }
}

function configFlag(args: readonly string[]): string | undefined {
    const idx = args.indexOf('--config');
    return idx !== -1 ? args[idx + 1] : undefined;
}

export interface CliDependencies {
    /** HTTP client for model calls and the backend check */
    fetchImpl?: FetchFn;
}

class RtlForgeCli {
    constructor(private readonly deps: CliDependencies = {}) { }

    async run(rawArgv: readonly string[]): Promise<number> {
        const { argv, verbose } = extractGlobalFlags(rawArgv);
        if (verbose) setLogLevel('debug');

        const command = argv[2] || 'help';
        switch (command) {
            case 'design':
                return this.runDesign(argv.slice(3));
            case 'show':
                return this.runShow(argv.slice(3));
            case 'check':
                return this.runCheck(argv.slice(3));
            case 'help':
            case '--help':
                this.showHelp();
                return EXIT.VERIFIED;
            default:
                console.error(`Unknown command: ${command}`);
                this.showHelp();
                return EXIT.USAGE;
        }
    }

    private loadConfig(args: { configPath?: string; overrides?: Partial<RunConfig> }): Readonly<RunConfig> | null {
        try {
            return loadRunConfig(args);
        } catch (err) {
            if (err instanceof ConfigError) {
                console.error(`Error: ${err.message}`);
                return null;
            }
            throw err;
        }
    }

    private async runDesign(args: string[]): Promise<number> {
        const parsed = parseDesignArgs(args);
        if (!parsed.ok) {
            console.error(`Error: ${parsed.error}`);
            console.error('Usage: rtlforge design "<prompt>" [--model ID] [--provider ollama|openrouter] [--max-retries N] [--config PATH] [--parallel N] [--top NAME] [--no-save]');
            return EXIT.USAGE;
        }
        const opts = parsed.value;

        const config = this.loadConfig({
            configPath: opts.configPath,
            overrides: {
                modelId: opts.model,
                provider: opts.provider,
                maxRetries: opts.maxRetries,
                maxParallel: opts.parallel,
                saveOnSuccess: opts.save ? undefined : false,
            },
        });
        if (!config) return EXIT.FAILED;

        const request: DesignRequest = { prompt: opts.prompt, topName: opts.top };
        const ledger = openLedger(config.ledgerPath);
        const cancel = new AbortController();
        const onSigint = () => {
            console.error('\nInterrupted, stopping run...');
            cancel.abort(new Error('Interrupted by user'));
        };
        process.once('SIGINT', onSigint);

        try {
            const result = await this.design(config, request, ledger, cancel.signal);

            for (const line of formatResultSummary(result)) console.log(line);

            if (result.status === 'VERIFIED') {
                if (config.saveOnSuccess) {
                    const saved = new DesignWriter(config.outputDir).save(result, request);
                    console.log(`  Saved to: ${saved.dir}`);
                } else {
                    console.log('');
                    console.log(result.design.source);
                }
                return EXIT.VERIFIED;
            }
            return EXIT.FAILED;
        } finally {
            process.removeListener('SIGINT', onSigint);
            ledger?.close();
        }
    }

    private async design(
        config: Readonly<RunConfig>,
        request: DesignRequest,
        ledger: RunLedger | null,
        signal: AbortSignal
    ): Promise<DesignResult> {
        const router = new ModelRouter({
            provider: config.provider,
            apiKey: config.apiKey,
            ollamaHost: config.ollamaHost,
            maxConcurrentCalls: config.maxConcurrentCalls,
            fetchImpl: this.deps.fetchImpl,
        });
        const client = new RouterGenerationClient(router, config.modelId);
        const systemPrompt = getSystemPrompt(config.extraInstructions);
        const runner = new CachingVerificationRunner(
            new IcarusVerificationRunner({
                workRoot: path.resolve(config.workDir),
                compiler: config.compiler,
                simulator: config.simulator,
                compileTimeoutMs: config.compileTimeoutMs,
                keepWorkDirs: config.keepWorkDirs,
            })
        );
        const verifier = new ModuleVerifier(new ModuleGenerator(client, { systemPrompt }), runner, {
            maxRetries: config.maxRetries,
            verifyTimeoutMs: config.verifyTimeoutMs,
        });

        let runId: string | null = null;
        const previous = new Map<string, Attempt>();

        // A ledger failure must not take the run down with it
        const record = (op: string, fn: (id: string, db: RunLedger) => void) => {
            if (runId === null || ledger === null) return;
            try {
                fn(runId, ledger);
            } catch (err) {
                log.warn(`Ledger ${op} skipped`, { error: errorMessage(err) });
            }
        };

        const hooks: OrchestratorHooks = {
            onPlan: (plan, id) => {
                runId = id;
                record('startRun', (rid, db) => db.startRun(rid, { prompt: request.prompt, provider: config.provider, model: config.modelId }));
                console.log(`Plan (${plan.order.length} modules, top ${plan.top}):`);
                for (const line of renderHierarchy(plan).split('\n')) console.log(`  ${line}`);
                console.log(`Build order: ${plan.order.join(' -> ')}\n`);
            },
            onModuleStart: (node, contextSize) => {
                console.log(`Generating ${node.name} (${contextSize} verified modules in context)`);
            },
            onAttempt: (node, attempt) => {
                record('recordAttempt', (rid, db) => db.recordAttempt(rid, node.name, attempt));
                console.log(formatAttemptLine(node.name, attempt, config.maxRetries));
                const prior = previous.get(node.name);
                if (config.showDiffs && prior && prior.implementation && attempt.implementation) {
                    const diff = diffAttempts(prior, attempt);
                    if (diff) console.log(diff.replace(/^/gm, '    ').trimEnd());
                }
                previous.set(node.name, attempt);
            },
            onModuleComplete: (result: ModuleResult) => {
                record('finishModule', (rid, db) => db.finishModule(rid, result));
                if (result.status === 'EXHAUSTED') {
                    console.log(`  [${result.name}] exhausted: ${result.lastDiagnosis.category}`);
                }
            },
            onModuleSkipped: (name, cause) => {
                console.log(`  [${name}] skipped (depends on failed ${cause})`);
            },
        };

        const orchestrator = new DesignOrchestrator(new PlanBuilder(client, systemPrompt), verifier, {
            maxParallel: config.maxParallel,
            runTimeoutMs: config.runTimeoutMs,
            hooks,
            signal,
        });
        const result = await orchestrator.run(request);

        if (runId === null) {
            runId = result.runId;
            record('startRun', (rid, db) => db.startRun(rid, { prompt: request.prompt, provider: config.provider, model: config.modelId }));
        }
        record('finishRun', (rid, db) => db.finishRun(rid, result.status, result.status === 'ABORTED' ? result.reason : null));
        const stats = runner.stats();
        log.debug(`Verification cache`, stats);
        return result;
    }

    private async runShow(args: string[]): Promise<number> {
        const runId = args[0];
        if (!runId) {
            console.error('Usage: rtlforge show <run-id> [--config PATH]');
            return EXIT.USAGE;
        }
        const config = this.loadConfig({ configPath: configFlag(args) });
        if (!config) return EXIT.FAILED;

        let ledger: RunLedger;
        try {
            ledger = new RunLedger(config.ledgerPath);
        } catch (err) {
            if (!(err instanceof LedgerError)) throw err;
            console.error(`Error: ${err.message}`);
            return EXIT.FAILED;
        }
        try {
            const run = ledger.getRun(runId);
            if (!run) {
                console.error(`No run ${runId} in ${config.ledgerPath}`);
                return EXIT.FAILED;
            }
            console.log(`Run ${run.runId}: ${run.status}`);
            console.log(`  Prompt: ${run.prompt}`);
            console.log(`  Model: ${run.provider ?? '?'} / ${run.model ?? '?'}`);
            console.log(`  Started: ${run.startedAt}  Finished: ${run.finishedAt ?? '-'}`);
            if (run.reason) console.log(`  Reason: ${run.reason}`);
            for (const m of ledger.getModules(runId)) {
                console.log(`  ${m.name}: ${m.status} after ${m.attempts} attempt(s)${m.lastCategory ? ` [${m.lastCategory}]` : ''}`);
                for (const a of ledger.getAttempts(runId, m.name)) {
                    console.log(`    #${a.index} ${a.status}${a.category ? ` (${a.category})` : ''} ${a.durationMs}ms`);
                }
            }
            return run.status === 'VERIFIED' ? EXIT.VERIFIED : EXIT.FAILED;
        } finally {
            ledger.close();
        }
    }

    private async runCheck(args: string[]): Promise<number> {
        const unknown = args.find(a => a.startsWith('--') && a !== '--config');
        if (unknown) {
            console.error(`Unknown option: ${unknown}`);
            console.error('Usage: rtlforge check [--config PATH]');
            return EXIT.USAGE;
        }
        const config = this.loadConfig({ configPath: configFlag(args) });
        if (!config) return EXIT.FAILED;

        console.log(`Checking ${config.provider} backend...`);
        const result = await checkBackend({
            provider: config.provider,
            modelId: config.modelId,
            apiKey: config.apiKey,
            ollamaHost: config.ollamaHost,
            fetchImpl: this.deps.fetchImpl,
        });
        const lines = formatCheckReport(result, config);
        for (const line of lines) {
            if (result.ok) console.log(line);
            else console.error(line);
        }
        return result.ok ? EXIT.VERIFIED : EXIT.FAILED;
    }

    private showHelp(): void {
        console.log(`
rtl-forge - verified Verilog from a natural-language description

USAGE:
  rtlforge <command> [options]

COMMANDS:
  design "<prompt>"   Plan, generate and verify a design
  show <run-id>       Print a recorded run from the ledger
  check               Check the model backend is reachable and list its models
  help                Show this help

GLOBAL OPTIONS:
  --verbose           Debug logging

DESIGN OPTIONS:
  --model ID          Model id (default from config)
  --provider NAME     ollama | openrouter
  --max-retries N     Attempts per module
  --config PATH       JSON config file (default ./rtlforge.config.json)
  --parallel N        Independent modules verified at once
  --top NAME          Preferred top module name
  --no-save           Print the design instead of writing it to disk

EXAMPLES:
  rtlforge design "4-bit ripple carry adder built from full adders"
  rtlforge design "8-bit up counter with synchronous reset" --provider openrouter --model qwen/qwen-2.5-coder-32b-instruct
  rtlforge check --config rtlforge.config.json
`);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new RtlForgeCli();
    cli.run(process.argv).then(
        code => {
            process.exitCode = code;
        },
        (err: unknown) => {
            console.error('Fatal error:', errorMessage(err));
            process.exitCode = EXIT.FAILED;
        }
    );
}

export { RtlForgeCli };
