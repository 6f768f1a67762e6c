// Shared in-process fakes for the test suites.

import type { GenerateOptions, GenerationClient } from '../src/generation_client';
import type { GenerationPrompt } from '../src/prompts';
import type { Candidate, CandidateGenerator, CandidateRequest } from '../src/module_generator';
import type { VerificationInput, VerificationRunner, VerifyOptions } from '../src/verification_runner';
import type { DesignPlan, FailedOutcome, PlanNode, Port, PortDirection, VerificationOutcome } from '../src/design_types';
import { validatePlan } from '../src/plan_builder';

export type ScriptStep = string | Error | ((prompt: GenerationPrompt) => string);

export class ScriptedClient implements GenerationClient {
    readonly calls: Array<{ prompt: GenerationPrompt; options: GenerateOptions }> = [];

    constructor(private readonly script: ScriptStep[]) { }

    async generate(prompt: GenerationPrompt, options: GenerateOptions = {}): Promise<string> {
        this.calls.push({ prompt, options });
        const next = this.script.shift();
        if (next === undefined) throw new Error('script exhausted');
        if (next instanceof Error) throw next;
        return typeof next === 'function' ? next(prompt) : next;
    }
}

export function port(name: string, direction: PortDirection, width = 1): Port {
    return { name, direction, width };
}

export interface RawModuleSpec {
    name: string;
    dependencies?: string[];
    ports?: Port[];
    description?: string;
}

export function decomposition(modules: RawModuleSpec[]): { modules: unknown[] } {
    return {
        modules: modules.map(m => ({
            name: m.name,
            description: m.description ?? `${m.name} module`,
            ports: m.ports ?? [port('a', 'input'), port('y', 'output')],
            dependencies: m.dependencies ?? [],
        })),
    };
}

export function makePlan(modules: RawModuleSpec[]): DesignPlan {
    return validatePlan(decomposition(modules));
}

export function findNode(plan: DesignPlan, name: string): PlanNode {
    const node = plan.nodes.find(n => n.name === name);
    if (!node) throw new Error(`no node ${name}`);
    return node;
}

export const HALF_FULL_ADDER = [
    { name: 'half_adder', ports: [port('a', 'input'), port('b', 'input'), port('sum', 'output'), port('carry', 'output')] },
    {
        name: 'full_adder',
        dependencies: ['half_adder'],
        ports: [port('a', 'input'), port('b', 'input'), port('cin', 'input'), port('sum', 'output'), port('cout', 'output')],
    },
];

/* -------------------------------------------------------------------------- */
/* Outcomes                                                                   */
/* -------------------------------------------------------------------------- */

export const passed = (vectors = 4): VerificationOutcome => ({
    status: 'PASSED',
    log: `${'[PASS] vector\n'.repeat(vectors)}[DONE]`,
    vectorsPassed: vectors,
});

export const compileError = (text: string): VerificationOutcome => ({ status: 'COMPILE_ERROR', diagnostic: text });

export const logicError = (lines: string[]): FailedOutcome => ({
    status: 'LOGIC_ERROR',
    diagnostic: lines.join('\n'),
    evidence: lines,
});

/* -------------------------------------------------------------------------- */
/* Generator / runner fakes                                                   */
/* -------------------------------------------------------------------------- */

/** Candidate text encodes module and attempt: `module <name> // v<k>` */
export class CountingGenerator implements CandidateGenerator {
    readonly requests: CandidateRequest[] = [];
    private readonly counts = new Map<string, number>();

    constructor(private readonly failures: Map<string, Error[]> = new Map()) { }

    async generate(request: CandidateRequest): Promise<Candidate> {
        this.requests.push(request);
        const name = request.node.name;
        const k = (this.counts.get(name) ?? 0) + 1;
        this.counts.set(name, k);

        const failure = this.failures.get(name)?.shift();
        if (failure) throw failure;

        return {
            implementation: `module ${name} // v${k}\nendmodule`,
            harness: `module tb_${name} // v${k}\nendmodule`,
        };
    }
}

export class ScriptedRunner implements VerificationRunner {
    readonly calls: Array<{ input: VerificationInput; options: VerifyOptions }> = [];

    /** Outcomes per module, consumed in order; PASSED once a script runs out. */
    constructor(private readonly script: Map<string, VerificationOutcome[]> = new Map()) { }

    async verify(input: VerificationInput, options: VerifyOptions): Promise<VerificationOutcome> {
        this.calls.push({ input, options });
        return this.script.get(input.moduleName)?.shift() ?? passed();
    }

    callsFor(name: string): VerificationInput[] {
        return this.calls.filter(c => c.input.moduleName === name).map(c => c.input);
    }
}
