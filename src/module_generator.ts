/**
 * Module Generator - one candidate (implementation + harness) per call.
 *
 * Both texts are regenerated on every attempt. Code from the failed attempt
 * is only shown to the model inside the repair block.
 */

import { createLogger } from './logger';
import { GenerationError } from './structured_error';
import { MAX_OUTPUT_TOKENS } from './config';
import { extractCode } from './response_parser';
import type { GenerationClient } from './generation_client';
import type { Diagnosis, PlanNode, VerifiedModule } from './design_types';
import {
    GenerationPrompt,
    getHarnessTask,
    getImplementationTask,
    getSystemPrompt,
} from './prompts';

const log = createLogger('generation');

export interface RepairContext {
    /** Index of the failed attempt */
    attempt: number;
    diagnosis: Diagnosis;
    implementation: string;
    harness: string;
}

export interface CandidateRequest {
    node: PlanNode;
    /** Verified transitive dependencies, dependency-first */
    context: readonly VerifiedModule[];
    repair: RepairContext | null;
    signal?: AbortSignal;
    runId?: string;
}

export interface Candidate {
    implementation: string;
    harness: string;
}

export interface CandidateGenerator {
    generate(request: CandidateRequest): Promise<Candidate>;
}

export interface ModuleGeneratorOptions {
    systemPrompt?: string;
    temperature?: number;
    maxTokens?: number;
}

export class ModuleGenerator implements CandidateGenerator {
    private readonly system: string;

    constructor(
        private readonly client: GenerationClient,
        private readonly options: ModuleGeneratorOptions = {}
    ) {
        this.system = options.systemPrompt ?? getSystemPrompt();
    }

    async generate(request: CandidateRequest): Promise<Candidate> {
        const { node, context, repair } = request;

        const implementationPrompt: GenerationPrompt = {
            system: this.system,
            task: getImplementationTask(node),
            context,
            repair: repair && {
                attempt: repair.attempt,
                category: repair.diagnosis.category,
                evidence: repair.diagnosis.evidence,
                previous: repair.implementation,
            },
        };
        const implementation = await this.call(implementationPrompt, 'implementation', request);

        const harnessPrompt: GenerationPrompt = {
            system: this.system,
            task: getHarnessTask(node, implementation),
            repair: repair && {
                attempt: repair.attempt,
                category: repair.diagnosis.category,
                evidence: repair.diagnosis.evidence,
                previous: repair.harness,
            },
        };
        const harness = await this.call(harnessPrompt, 'harness', request);

        log.debug(`Candidate generated`, {
            module: node.name,
            repair: repair?.attempt ?? null,
            impl_chars: implementation.length,
            tb_chars: harness.length,
        });
        return { implementation, harness };
    }

    private async call(prompt: GenerationPrompt, purpose: string, request: CandidateRequest): Promise<string> {
        const text = await this.client.generate(prompt, {
            signal: request.signal,
            temperature: this.options.temperature,
            maxTokens: this.options.maxTokens ?? MAX_OUTPUT_TOKENS.MODULE,
            purpose,
            module: request.node.name,
            runId: request.runId,
        });
        const code = extractCode(text);
        if (code.length === 0) {
            throw new GenerationError('MALFORMED_RESPONSE', `Model returned no ${purpose} code for ${request.node.name}`, false, {
                module: request.node.name,
                purpose,
            });
        }
        return code;
    }
}
