/**
 * Plan Builder - design request -> validated dependency graph of modules
 *
 * The decomposition comes back from the model as untyped text. It is only
 * admitted into PlanNode form after the schema check, name resolution, the
 * cycle check and the single-top check all pass.
 */

import { createLogger } from './logger';
import { PlanningError } from './structured_error';
import { SchemaValidator, JsonSchema, formatValidationErrors } from './schema_validator';
import { MAX_OUTPUT_TOKENS } from './config';
import { extractJson } from './response_parser';
import { getDecompositionPrompt, getSystemPrompt } from './prompts';
import { findCycle, findSinks, toGraph, topologicalOrder } from './plan_graph';
import type { GenerationClient } from './generation_client';
import type { DesignPlan, DesignRequest, PlanNode, Port, PortDirection } from './design_types';
import { VERILOG_IDENTIFIER } from './design_types';

const log = createLogger('planner');

/* -------------------------------------------------------------------------- */
/* Admission schema                                                           */
/* -------------------------------------------------------------------------- */

interface RawPort {
    name: string;
    direction: PortDirection;
    width: number;
}

interface RawModule {
    name: string;
    description: string;
    ports: RawPort[];
    dependencies?: string[];
}

interface RawPlan {
    modules: RawModule[];
}

const IDENTIFIER_PATTERN = VERILOG_IDENTIFIER.source;

const DECOMPOSITION_SCHEMA: JsonSchema = {
    type: 'object',
    required: ['modules'],
    properties: {
        modules: {
            type: 'array',
            minItems: 1,
            items: {
                type: 'object',
                required: ['name', 'description', 'ports'],
                properties: {
                    name: { type: 'string', pattern: IDENTIFIER_PATTERN },
                    description: { type: 'string' },
                    ports: {
                        type: 'array',
                        items: {
                            type: 'object',
                            required: ['name', 'direction', 'width'],
                            properties: {
                                name: { type: 'string', pattern: IDENTIFIER_PATTERN },
                                direction: { type: 'string', enum: ['input', 'output', 'inout'] },
                                width: { type: 'integer', minimum: 1 },
                            },
                        },
                    },
                    dependencies: { type: 'array', items: { type: 'string' } },
                },
            },
        },
    },
};

const validator = new SchemaValidator();
validator.registerSchema('decomposition_v1', DECOMPOSITION_SCHEMA);

function isRawPlan(value: unknown): value is RawPlan {
    return validator.validate(value, 'decomposition_v1').valid;
}

/* -------------------------------------------------------------------------- */
/* Validation                                                                 */
/* -------------------------------------------------------------------------- */

function unparsable(message: string, context: Record<string, unknown> = {}): PlanningError {
    return new PlanningError('UNPARSABLE_DECOMPOSITION', message, context);
}

function toNode(raw: RawModule): PlanNode {
    const portNames = new Set<string>();
    const ports: Port[] = [];
    for (const p of raw.ports) {
        if (portNames.has(p.name)) {
            throw unparsable(`Module ${raw.name} declares port ${p.name} twice`, { module: raw.name, port: p.name });
        }
        portNames.add(p.name);
        ports.push(Object.freeze({ name: p.name, direction: p.direction, width: p.width }));
    }

    return Object.freeze({
        name: raw.name,
        description: raw.description.trim(),
        ports: Object.freeze(ports),
        dependencies: Object.freeze([...new Set(raw.dependencies ?? [])]),
    });
}

/**
 * Admit an untyped decomposition payload as a DesignPlan.
 * Throws PlanningError with the matching code on any violation.
 */
export function validatePlan(payload: unknown): DesignPlan {
    if (!isRawPlan(payload)) {
        const result = validator.validate(payload, 'decomposition_v1');
        throw unparsable(`Decomposition failed schema validation: ${formatValidationErrors(result.errors)}`, {
            errors: result.errors,
        });
    }

    const names = new Set<string>();
    for (const m of payload.modules) {
        if (names.has(m.name)) {
            throw unparsable(`Duplicate module name: ${m.name}`, { module: m.name });
        }
        names.add(m.name);
    }

    const nodes = payload.modules.map(toNode);

    for (const node of nodes) {
        for (const dep of node.dependencies) {
            if (!names.has(dep)) {
                throw unparsable(`Module ${node.name} depends on unknown module ${dep}`, { module: node.name, dependency: dep });
            }
        }
    }

    const cycle = findCycle(toGraph(nodes));
    if (cycle) {
        throw new PlanningError('CYCLIC_DEPENDENCY', `Dependency cycle: ${cycle.join(' -> ')}`, { cycle });
    }

    const sinks = findSinks(nodes);
    if (sinks.length !== 1) {
        throw new PlanningError('AMBIGUOUS_TOP', `Expected exactly one top module, found ${sinks.length}: ${sinks.join(', ')}`, {
            candidates: sinks,
        });
    }

    const { order, blocked } = topologicalOrder(nodes);
    if (blocked.length > 0) {
        throw new PlanningError('CYCLIC_DEPENDENCY', `Unorderable modules: ${blocked.join(', ')}`, { cycle: blocked });
    }

    return Object.freeze({
        nodes: Object.freeze(nodes),
        order: Object.freeze(order),
        top: sinks[0],
    });
}

/* -------------------------------------------------------------------------- */
/* Plan Builder                                                               */
/* -------------------------------------------------------------------------- */

export interface BuildOptions {
    signal?: AbortSignal;
    runId?: string;
}

export class PlanBuilder {
    constructor(
        private readonly client: GenerationClient,
        private readonly systemPrompt: string = getSystemPrompt()
    ) { }

    /**
     * One decomposition call, then validation. A GenerationError from the
     * backend propagates unchanged; everything else wrong is a PlanningError.
     */
    async build(request: DesignRequest, options: BuildOptions = {}): Promise<DesignPlan> {
        const text = await this.client.generate(
            { system: this.systemPrompt, task: getDecompositionPrompt(request) },
            {
                json: true,
                purpose: 'decompose',
                maxTokens: MAX_OUTPUT_TOKENS.DECOMPOSE,
                signal: options.signal,
                runId: options.runId,
            }
        );

        const payload = extractJson(text);
        if (payload === undefined) {
            throw unparsable('Decomposition response is not JSON', { snippet: text.slice(0, 200) });
        }

        const plan = validatePlan(payload);

        if (request.topName && request.topName !== plan.top) {
            log.warn(`Top module name differs from request`, { requested: request.topName, planned: plan.top });
        }
        log.info(`Plan accepted`, { modules: plan.order.length, top: plan.top, order: plan.order });
        return plan;
    }
}
