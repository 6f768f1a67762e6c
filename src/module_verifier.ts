/**
 * Module Verifier - bounded generate / verify / diagnose loop for one node.
 *
 *   INIT -> GENERATING -> VERIFYING -> PASSED
 *                ^             |
 *                |             v
 *                +------- DIAGNOSING -> EXHAUSTED
 *
 * ABORTED is reachable from any non-terminal state once the run signal
 * fires. One candidate per attempt; attempts are strictly sequential.
 */

import { createLogger, withModuleCorrelation } from './logger';
import { GenerationError, errorMessage } from './structured_error';
import { classify, diagnoseFailure } from './diagnostic_classifier';
import type { Candidate, CandidateGenerator, RepairContext } from './module_generator';
import type { LibrarySource, VerificationRunner } from './verification_runner';
import type { ContextSnapshot } from './module_context';
import type {
    Attempt,
    Diagnosis,
    FailedOutcome,
    ModuleResult,
    PlanNode,
    VerificationOutcome,
    VerifiedModule,
} from './design_types';

const log = createLogger('verifier');

export type VerifierState =
    | 'INIT'
    | 'GENERATING'
    | 'VERIFYING'
    | 'DIAGNOSING'
    | 'PASSED'
    | 'EXHAUSTED'
    | 'ABORTED';

export interface ModuleVerifierOptions {
    /** Attempt budget per node, >= 1 */
    maxRetries: number;
    /** Simulation timeout per attempt */
    verifyTimeoutMs: number;
    onAttempt?: (node: PlanNode, attempt: Attempt) => void;
    onStateChange?: (node: PlanNode, from: VerifierState, to: VerifierState) => void;
}

export interface NodeVerificationRequest {
    node: PlanNode;
    /** Context taken when the node started */
    snapshot: ContextSnapshot;
    /** Transitive dependency names, dependency-first */
    dependencies: readonly string[];
    signal?: AbortSignal;
    runId?: string;
    /** Per-run observer, called after the constructor-level one */
    onAttempt?: (node: PlanNode, attempt: Attempt) => void;
}

interface AttemptBody {
    implementation: string;
    harness: string;
    outcome: VerificationOutcome;
    diagnosis: Diagnosis | null;
}

export function abortReason(signal: AbortSignal | undefined): string {
    const reason: unknown = signal?.reason;
    if (reason instanceof Error) return reason.message;
    if (typeof reason === 'string' && reason.length > 0) return reason;
    return 'Run aborted';
}

export class ModuleVerifier {
    constructor(
        private readonly generator: CandidateGenerator,
        private readonly runner: VerificationRunner,
        private readonly options: ModuleVerifierOptions
    ) {
        if (!Number.isInteger(options.maxRetries) || options.maxRetries < 1) {
            throw new RangeError(`maxRetries must be an integer >= 1, got ${options.maxRetries}`);
        }
    }

    get maxRetries(): number {
        return this.options.maxRetries;
    }

    verify(request: NodeVerificationRequest): Promise<ModuleResult> {
        return withModuleCorrelation(request.node.name, () => this.verifyNode(request));
    }

    private async verifyNode(request: NodeVerificationRequest): Promise<ModuleResult> {
        const { node, signal } = request;
        const attempts: Attempt[] = [];
        const context = request.snapshot.select(request.dependencies);
        const librarySources = context.map(m => ({ name: m.name, source: m.implementation }));

        let state: VerifierState = 'INIT';
        const transition = (next: VerifierState) => {
            this.options.onStateChange?.(node, state, next);
            state = next;
        };

        const aborted = (): ModuleResult => {
            transition('ABORTED');
            const reason = abortReason(signal);
            log.warn(`Module aborted`, { module: node.name, attempts: attempts.length, reason });
            return { status: 'ABORTED', name: node.name, reason, attempts: [...attempts] };
        };

        let repair: RepairContext | null = null;

        while (true) {
            if (signal?.aborted) return aborted();

            const index = attempts.length + 1;
            const started = Date.now();
            const startedAt = new Date(started).toISOString();

            const body = await this.runAttempt(request, context, librarySources, repair, transition);
            if (body === null) return aborted();
            const { implementation, harness } = body;

            const attempt: Attempt = Object.freeze({
                index,
                implementation,
                harness,
                outcome: Object.freeze(body.outcome),
                diagnosis: body.diagnosis === null ? null : Object.freeze(body.diagnosis),
                startedAt,
                durationMs: Date.now() - started,
            });
            attempts.push(attempt);
            this.options.onAttempt?.(node, attempt);
            request.onAttempt?.(node, attempt);

            if (attempt.diagnosis === null) {
                transition('PASSED');
                log.info(`Module verified`, { module: node.name, attempt: index });
                const module: VerifiedModule = Object.freeze({
                    name: node.name,
                    ports: node.ports,
                    implementation,
                    harness,
                    dependencies: node.dependencies,
                });
                return { status: 'VERIFIED', name: node.name, module, attempts: [...attempts] };
            }

            log.info(`Attempt ${index}/${this.options.maxRetries} failed`, {
                module: node.name,
                status: attempt.outcome.status,
                category: attempt.diagnosis.category,
            });

            if (index >= this.options.maxRetries) {
                transition('EXHAUSTED');
                return { status: 'EXHAUSTED', name: node.name, lastDiagnosis: attempt.diagnosis, attempts: [...attempts] };
            }

            const nextRepair: RepairContext = {
                attempt: index,
                diagnosis: attempt.diagnosis,
                implementation: implementation || (repair?.implementation ?? ''),
                harness: harness || (repair?.harness ?? ''),
            };
            repair = nextRepair;
        }
    }

    /** One GENERATING -> VERIFYING (-> DIAGNOSING) pass. Null when the run was aborted mid-way. */
    private async runAttempt(
        request: NodeVerificationRequest,
        context: readonly VerifiedModule[],
        librarySources: readonly LibrarySource[],
        repair: RepairContext | null,
        transition: (next: VerifierState) => void
    ): Promise<AttemptBody | null> {
        const { node, signal } = request;

        transition('GENERATING');
        let candidate: Candidate;
        try {
            candidate = await this.generator.generate({ node, context, repair, signal, runId: request.runId });
        } catch (err) {
            if (signal?.aborted) return null;
            if (!(err instanceof GenerationError)) throw err;
            const outcome: FailedOutcome = {
                status: 'TOOL_UNAVAILABLE',
                diagnostic: `Generation failed (${err.generationCode}): ${errorMessage(err)}`,
            };
            return { implementation: '', harness: '', outcome, diagnosis: classify(outcome.diagnostic, 'generate') };
        }
        if (signal?.aborted) return null;

        const { implementation, harness } = candidate;
        transition('VERIFYING');
        const outcome = await this.runner.verify(
            { moduleName: node.name, implementation, harness, librarySources },
            { timeoutMs: this.options.verifyTimeoutMs, signal }
        );
        if (outcome.status === 'PASSED') {
            return { implementation, harness, outcome, diagnosis: null };
        }
        if (signal?.aborted) return null;

        transition('DIAGNOSING');
        return { implementation, harness, outcome, diagnosis: diagnoseFailure(outcome) };
    }
}
