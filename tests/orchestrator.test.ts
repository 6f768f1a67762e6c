import test from 'node:test';
import assert from 'node:assert/strict';

import { DesignOrchestrator, NodeVerifier, Planner } from '../src/orchestrator';
import { ModuleVerifier } from '../src/module_verifier';
import { PlanningError } from '../src/structured_error';
import type { VerificationRunner } from '../src/verification_runner';
import type { DesignPlan, ModuleResult, VerificationOutcome } from '../src/design_types';
import {
    CountingGenerator,
    HALF_FULL_ADDER,
    RawModuleSpec,
    ScriptedRunner,
    compileError,
    logicError,
    makePlan,
} from './helpers';

function fixedPlanner(plan: DesignPlan): Planner {
    return { build: async () => plan };
}

function setup(modules: RawModuleSpec[], runner: VerificationRunner, maxRetries = 3) {
    const plan = makePlan(modules);
    const generator = new CountingGenerator();
    const verifier = new ModuleVerifier(generator, runner, { maxRetries, verifyTimeoutMs: 1000 });
    return { plan, generator, verifier, planner: fixedPlanner(plan) };
}

test('a dependent repairs against the verified dependency until it passes', async () => {
    const runner = new ScriptedRunner(new Map([
        ['full_adder', [logicError(['[FAIL] a=1 b=1 cin=1']), logicError(['[FAIL] a=1 b=0 cin=1'])]],
    ]));
    const { generator, verifier, planner } = setup(HALF_FULL_ADDER, runner);
    const starts: Array<[string, number]> = [];
    let plannedRunId = '';

    const result = await new DesignOrchestrator(planner, verifier, {
        hooks: {
            onPlan: (_plan, runId) => { plannedRunId = runId; },
            onModuleStart: (node, size) => starts.push([node.name, size]),
        },
    }).run({ prompt: '1-bit full adder' });

    assert.equal(result.status, 'VERIFIED');
    assert.equal(result.runId, plannedRunId);
    assert.deepEqual(result.modules.map(m => [m.name, m.attempts.length]), [['half_adder', 1], ['full_adder', 3]]);
    assert.deepEqual(starts, [['half_adder', 0], ['full_adder', 1]]);

    const fullAdderRequests = generator.requests.filter(r => r.node.name === 'full_adder');
    assert.equal(fullAdderRequests.length, 3);
    for (const r of fullAdderRequests) {
        assert.deepEqual(r.context.map(m => m.name), ['half_adder']);
    }
    assert.deepEqual(runner.callsFor('full_adder').map(c => c.librarySources.map(l => l.name)), [
        ['half_adder'], ['half_adder'], ['half_adder'],
    ]);

    if (result.status !== 'VERIFIED') return;
    assert.equal(result.design.top, 'full_adder');
    assert.equal(result.design.source, [
        '// Top module: full_adder',
        '// Modules (dependency order): half_adder, full_adder',
        '',
        'module half_adder // v1\nendmodule',
        '',
        'module full_adder // v3\nendmodule',
        '',
    ].join('\n'));
});

test('a single node that exhausts its attempts is PARTIALLY_FAILED', async () => {
    const runner = new ScriptedRunner(new Map([
        ['alu', [compileError('alu.v:4: syntax error'), compileError('alu.v:9: syntax error')]],
    ]));
    const { verifier, planner } = setup([{ name: 'alu' }], runner, 2);

    const result = await new DesignOrchestrator(planner, verifier).run({ prompt: 'alu' });

    assert.equal(result.status, 'PARTIALLY_FAILED');
    if (result.status !== 'PARTIALLY_FAILED') return;
    assert.deepEqual(result.failed, [{
        name: 'alu',
        lastDiagnosis: { category: 'SYNTAX_ERROR', evidence: 'alu.v:9: syntax error', phase: 'compile' },
        reason: 'Exhausted 2 attempts (SYNTAX_ERROR)',
    }]);
    assert.deepEqual(result.skipped, []);
    assert.equal(result.modules.length, 1);
});

const BRANCHED: RawModuleSpec[] = [
    { name: 'top', dependencies: ['mid', 'other'] },
    { name: 'mid', dependencies: ['leaf'] },
    { name: 'leaf' },
    { name: 'other' },
];

test('a failed node skips its dependents while other branches continue', async () => {
    const runner = new ScriptedRunner(new Map([['leaf', [compileError('leaf.v:1: syntax error')]]]));
    const { plan, verifier, planner } = setup(BRANCHED, runner, 1);
    const skippedEvents: Array<[string, string]> = [];

    const result = await new DesignOrchestrator(planner, verifier, {
        hooks: { onModuleSkipped: (name, cause) => skippedEvents.push([name, cause]) },
    }).run({ prompt: 'branched' });

    assert.deepEqual(plan.order, ['leaf', 'mid', 'other', 'top']);
    assert.equal(result.status, 'PARTIALLY_FAILED');
    if (result.status !== 'PARTIALLY_FAILED') return;
    assert.deepEqual(result.failed.map(f => f.name), ['leaf']);
    assert.deepEqual(result.skipped, ['mid', 'top']);
    assert.deepEqual(skippedEvents, [['mid', 'leaf'], ['top', 'leaf']]);
    assert.deepEqual(result.modules.map(m => [m.name, m.status]), [['leaf', 'EXHAUSTED'], ['other', 'VERIFIED']]);
    assert.deepEqual(runner.calls.map(c => c.input.moduleName), ['leaf', 'other']);
});

test('parallel siblings share the snapshot taken when they start', async () => {
    const { generator, verifier, planner } = setup([
        { name: 'top', dependencies: ['left', 'right'] },
        { name: 'left', dependencies: ['leaf'] },
        { name: 'right', dependencies: ['leaf'] },
        { name: 'leaf' },
    ], new ScriptedRunner());
    const starts: Array<[string, number]> = [];

    const result = await new DesignOrchestrator(planner, verifier, {
        maxParallel: 2,
        hooks: { onModuleStart: (node, size) => starts.push([node.name, size]) },
    }).run({ prompt: 'diamond' });

    assert.equal(result.status, 'VERIFIED');
    assert.deepEqual(starts, [['leaf', 0], ['left', 1], ['right', 1], ['top', 3]]);
    const topRequest = generator.requests.find(r => r.node.name === 'top');
    assert.deepEqual(topRequest?.context.map(m => m.name), ['leaf', 'left', 'right']);
});

test('the run deadline aborts in-flight and unstarted nodes', async () => {
    const hanging: VerificationRunner = {
        verify: (_input, options) => new Promise<VerificationOutcome>(resolve => {
            options.signal?.addEventListener('abort', () => resolve({ status: 'TIMEOUT', diagnostic: 'cancelled' }), { once: true });
        }),
    };
    const { verifier, planner } = setup(HALF_FULL_ADDER, hanging);
    const completed: string[] = [];

    const result = await new DesignOrchestrator(planner, verifier, {
        runTimeoutMs: 50,
        hooks: { onModuleComplete: r => completed.push(`${r.name}:${r.status}`) },
    }).run({ prompt: 'adder' });

    assert.equal(result.status, 'ABORTED');
    if (result.status !== 'ABORTED') return;
    assert.equal(result.reason, 'Run exceeded 50ms');
    assert.equal(result.error?.code, 'RUN_TIMEOUT');
    assert.deepEqual(result.error?.context, { timeout_ms: 50 });
    assert.deepEqual(result.aborted, ['half_adder', 'full_adder']);
    assert.deepEqual(result.modules.map(m => [m.name, m.status, m.attempts.length]), [
        ['half_adder', 'ABORTED', 0],
        ['full_adder', 'ABORTED', 0],
    ]);
    assert.deepEqual(result.failed, []);
    // the unstarted node is reported to observers too
    assert.deepEqual(completed, ['half_adder:ABORTED', 'full_adder:ABORTED']);
});

test('a planning failure aborts before any module work', async () => {
    let verifyCalls = 0;
    const verifier: NodeVerifier = {
        async verify(): Promise<ModuleResult> {
            verifyCalls++;
            throw new Error('unreachable');
        },
    };
    const planner: Planner = {
        async build() {
            throw new PlanningError('CYCLIC_DEPENDENCY', 'Dependency cycle: a -> a', { cycle: ['a', 'a'] });
        },
    };

    const result = await new DesignOrchestrator(planner, verifier).run({ prompt: 'loop' });

    assert.equal(result.status, 'ABORTED');
    assert.equal(result.plan, null);
    assert.deepEqual(result.modules, []);
    assert.equal(verifyCalls, 0);
    if (result.status !== 'ABORTED') return;
    assert.equal(result.reason, 'Planning failed: Dependency cycle: a -> a');
    assert.equal(result.error?.code, 'CYCLIC_DEPENDENCY');
    assert.equal(result.error?.severity, 'FATAL');
});

test('a crashing verifier fails only that node and its dependents', async () => {
    const plan = makePlan(HALF_FULL_ADDER);
    const verifier: NodeVerifier = {
        async verify(): Promise<ModuleResult> {
            throw new Error('boom');
        },
    };

    const result = await new DesignOrchestrator(fixedPlanner(plan), verifier).run({ prompt: 'adder' });

    assert.equal(result.status, 'PARTIALLY_FAILED');
    if (result.status !== 'PARTIALLY_FAILED') return;
    assert.deepEqual(result.failed, [{ name: 'half_adder', lastDiagnosis: null, reason: 'Unexpected error: boom' }]);
    assert.deepEqual(result.skipped, ['full_adder']);
});

test('external cancellation aborts the run', async () => {
    const controller = new AbortController();
    controller.abort('cancelled by user');
    const { verifier, planner, generator } = setup(HALF_FULL_ADDER, new ScriptedRunner());

    const result = await new DesignOrchestrator(planner, verifier, { signal: controller.signal }).run({ prompt: 'adder' });

    assert.equal(result.status, 'ABORTED');
    if (result.status !== 'ABORTED') return;
    assert.equal(result.reason, 'cancelled by user');
    assert.deepEqual(result.aborted, ['half_adder', 'full_adder']);
    assert.equal(generator.requests.length, 0);
});
