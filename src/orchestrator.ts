/**
 * Orchestrator - plan, then verify nodes bottom-up.
 *
 * A node starts once every dependency is VERIFIED; up to `maxParallel`
 * ready nodes run at once, started in topological order. An exhausted node
 * takes its transitive dependents down with it (fail-fast) while unrelated
 * branches carry on. A run-level deadline aborts everything in flight.
 *
 * run() always resolves with a DesignResult.
 */

import * as crypto from 'crypto';
import { createLogger, setCorrelation, clearCorrelation } from './logger';
import { createStructuredError, errorMessage, toStructuredError, StructuredError } from './structured_error';
import { ModuleContext } from './module_context';
import { composeDesign } from './design_composer';
import { transitiveDependencies, transitiveDependents } from './plan_graph';
import { abortReason, NodeVerificationRequest } from './module_verifier';
import type {
    Attempt,
    DesignPlan,
    DesignRequest,
    DesignResult,
    FailedNode,
    ModuleResult,
    PlanNode,
} from './design_types';

const log = createLogger('orchestrator');

export interface Planner {
    build(request: DesignRequest, options: { signal?: AbortSignal; runId?: string }): Promise<DesignPlan>;
}

export interface NodeVerifier {
    verify(request: NodeVerificationRequest): Promise<ModuleResult>;
}

export interface OrchestratorHooks {
    onPlan?: (plan: DesignPlan, runId: string) => void;
    /** `contextSize` is the number of verified modules visible to the node */
    onModuleStart?: (node: PlanNode, contextSize: number) => void;
    onAttempt?: (node: PlanNode, attempt: Attempt) => void;
    onModuleComplete?: (result: ModuleResult) => void;
    /** `cause` is the failed node that made `name` unreachable */
    onModuleSkipped?: (name: string, cause: string) => void;
}

export interface OrchestratorOptions {
    maxParallel?: number;
    runTimeoutMs?: number;
    hooks?: OrchestratorHooks;
    /** External cancellation (e.g. SIGINT) */
    signal?: AbortSignal;
}

class RunDeadlineError extends Error {
    constructor(readonly timeoutMs: number) {
        super(`Run exceeded ${timeoutMs}ms`);
        this.name = 'RunDeadlineError';
    }
}

interface RunFrame {
    runId: string;
    started: number;
    startedAt: string;
}

export class DesignOrchestrator {
    private readonly maxParallel: number;
    private readonly hooks: OrchestratorHooks;

    constructor(
        private readonly planner: Planner,
        private readonly verifier: NodeVerifier,
        private readonly options: OrchestratorOptions = {}
    ) {
        this.maxParallel = Math.max(1, options.maxParallel ?? 1);
        this.hooks = options.hooks ?? {};
    }

    async run(request: DesignRequest): Promise<DesignResult> {
        const frame: RunFrame = {
            runId: crypto.randomUUID(),
            started: Date.now(),
            startedAt: new Date().toISOString(),
        };
        setCorrelation({ runId: frame.runId });

        const controller = new AbortController();
        const timeoutMs = this.options.runTimeoutMs;
        const timer = timeoutMs !== undefined
            ? setTimeout(() => controller.abort(new RunDeadlineError(timeoutMs)), timeoutMs)
            : null;
        const external = this.options.signal;
        const onExternalAbort = () => controller.abort(external?.reason);
        if (external?.aborted) onExternalAbort();
        external?.addEventListener('abort', onExternalAbort, { once: true });

        const frozen: DesignRequest = Object.freeze({
            ...request,
            interfaceHints: request.interfaceHints ? Object.freeze([...request.interfaceHints]) : undefined,
        });

        try {
            let plan: DesignPlan;
            try {
                plan = await this.planner.build(frozen, { signal: controller.signal, runId: frame.runId });
            } catch (err) {
                log.error(`Planning failed`, { error: errorMessage(err) });
                return this.abortedResult(frame, null, [], `Planning failed: ${errorMessage(err)}`, toStructuredError(err), [], [], []);
            }

            this.hooks.onPlan?.(plan, frame.runId);
            log.info(`Plan ready`, { order: plan.order, top: plan.top, max_parallel: this.maxParallel });
            return await this.execute(frame, plan, controller.signal);
        } catch (err) {
            log.error(`Run failed unexpectedly`, { error: errorMessage(err) });
            return this.abortedResult(frame, null, [], `Internal error: ${errorMessage(err)}`, toStructuredError(err), [], [], []);
        } finally {
            if (timer) clearTimeout(timer);
            external?.removeEventListener('abort', onExternalAbort);
            clearCorrelation();
        }
    }

    private async execute(frame: RunFrame, plan: DesignPlan, signal: AbortSignal): Promise<DesignResult> {
        const context = new ModuleContext();
        const results = new Map<string, ModuleResult>();
        const skipped = new Set<string>();
        const crashed = new Set<string>();
        const inFlight = new Map<string, Promise<void>>();
        const nodes = new Map(plan.nodes.map(n => [n.name, n]));

        const settled = (name: string) => results.has(name) || skipped.has(name) || inFlight.has(name);
        const isReady = (node: PlanNode) => node.dependencies.every(d => results.get(d)?.status === 'VERIFIED');

        const complete = (result: ModuleResult): void => {
            results.set(result.name, result);
            if (result.status === 'VERIFIED') {
                context.add(result.module);
            } else if (!signal.aborted) {
                for (const dependent of transitiveDependents(plan, result.name)) {
                    if (results.has(dependent) || skipped.has(dependent)) continue;
                    skipped.add(dependent);
                    log.warn(`Skipping ${dependent}`, { cause: result.name });
                    this.hooks.onModuleSkipped?.(dependent, result.name);
                }
            }
            this.hooks.onModuleComplete?.(result);
        };

        const start = (node: PlanNode): void => {
            const snapshot = context.snapshot();
            this.hooks.onModuleStart?.(node, snapshot.size);
            log.info(`Module started`, { module: node.name, context: snapshot.size });

            const task = this.verifier
                .verify({
                    node,
                    snapshot,
                    dependencies: transitiveDependencies(plan, node.name),
                    signal,
                    runId: frame.runId,
                    onAttempt: this.hooks.onAttempt,
                })
                .catch((err: unknown): ModuleResult => {
                    log.error(`Module crashed`, { module: node.name, error: errorMessage(err) });
                    crashed.add(node.name);
                    return { status: 'ABORTED', name: node.name, reason: `Unexpected error: ${errorMessage(err)}`, attempts: [] };
                })
                .then(complete)
                .finally(() => {
                    inFlight.delete(node.name);
                });
            inFlight.set(node.name, task);
        };

        while (!signal.aborted) {
            for (const name of plan.order) {
                if (inFlight.size >= this.maxParallel) break;
                const node = nodes.get(name);
                if (!node || settled(name) || !isReady(node)) continue;
                start(node);
            }
            if (inFlight.size === 0) break;
            await Promise.race(inFlight.values());
        }

        // Deadline or cancellation: in-flight nodes observe the signal and return ABORTED
        await Promise.all(inFlight.values());

        const modules = (): ModuleResult[] =>
            plan.order.flatMap(name => {
                const result = results.get(name);
                return result ? [result] : [];
            });
        const skippedList = plan.order.filter(n => skipped.has(n));

        if (plan.order.every(n => results.get(n)?.status === 'VERIFIED')) {
            const design = composeDesign(plan, context);
            log.info(`Design verified`, { top: plan.top, modules: plan.order.length });
            return {
                status: 'VERIFIED',
                runId: frame.runId,
                plan,
                modules: modules(),
                design,
                startedAt: frame.startedAt,
                durationMs: Date.now() - frame.started,
            };
        }

        if (signal.aborted) {
            const reason = abortReason(signal);
            for (const name of plan.order) {
                if (!results.has(name) && !skipped.has(name)) {
                    const unstarted: ModuleResult = { status: 'ABORTED', name, reason, attempts: [] };
                    results.set(name, unstarted);
                    this.hooks.onModuleComplete?.(unstarted);
                }
            }
            const aborted = plan.order.filter(n => results.get(n)?.status === 'ABORTED');
            const cause: unknown = signal.reason;
            const error = cause instanceof RunDeadlineError
                ? createStructuredError('RUN_TIMEOUT', reason, { timeout_ms: cause.timeoutMs })
                : toStructuredError(cause ?? reason);
            log.warn(`Run aborted`, { reason, aborted });
            return this.abortedResult(frame, plan, modules(), reason, error, aborted, failedNodes(modules(), crashed), skippedList);
        }

        const failed = failedNodes(modules(), crashed);
        log.warn(`Design partially failed`, { failed: failed.map(f => f.name), skipped: skippedList });
        return {
            status: 'PARTIALLY_FAILED',
            runId: frame.runId,
            plan,
            modules: modules(),
            failed,
            skipped: skippedList,
            startedAt: frame.startedAt,
            durationMs: Date.now() - frame.started,
        };
    }

    private abortedResult(
        frame: RunFrame,
        plan: DesignPlan | null,
        modules: readonly ModuleResult[],
        reason: string,
        error: StructuredError | null,
        aborted: readonly string[],
        failed: readonly FailedNode[],
        skipped: readonly string[]
    ): DesignResult {
        return {
            status: 'ABORTED',
            runId: frame.runId,
            plan,
            modules,
            reason,
            error,
            aborted,
            failed,
            skipped,
            startedAt: frame.startedAt,
            durationMs: Date.now() - frame.started,
        };
    }
}

function failedNodes(modules: readonly ModuleResult[], crashed: ReadonlySet<string>): FailedNode[] {
    const failed: FailedNode[] = [];
    for (const m of modules) {
        if (m.status === 'EXHAUSTED') {
            failed.push({
                name: m.name,
                lastDiagnosis: m.lastDiagnosis,
                reason: `Exhausted ${m.attempts.length} attempts (${m.lastDiagnosis.category})`,
            });
        } else if (m.status === 'ABORTED' && crashed.has(m.name)) {
            failed.push({ name: m.name, lastDiagnosis: null, reason: m.reason });
        }
    }
    return failed;
}
