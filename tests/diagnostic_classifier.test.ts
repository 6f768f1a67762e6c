import test from 'node:test';
import assert from 'node:assert/strict';

import { classify, classifyOutcome, diagnoseFailure } from '../src/diagnostic_classifier';
import { logicError, passed } from './helpers';

test('syntax errors keep two lines of context either side', () => {
    const raw = [
        'full_adder.v:1: warning: implicit wire',
        'full_adder.v:2: note',
        'full_adder.v:3: syntax error',
        'full_adder.v:4: error: invalid module item.',
        'full_adder.v:5: note',
        'full_adder.v:6: note',
    ].join('\n');

    assert.deepEqual(classify(raw, 'compile'), {
        category: 'SYNTAX_ERROR',
        evidence: raw.split('\n').slice(0, 5).join('\n'),
        phase: 'compile',
    });
});

test('unknown module type is UNRESOLVED_REFERENCE', () => {
    const d = classify('full_adder.v:10: error: Unknown module type: xor_gate', 'compile');
    assert.equal(d.category, 'UNRESOLVED_REFERENCE');
    assert.equal(d.evidence, 'full_adder.v:10: error: Unknown module type: xor_gate');
});

test('port errors are PORT_MISMATCH', () => {
    assert.equal(classify("full_adder.v:7: error: port ``cin'' is not a port of ha0.", 'compile').category, 'PORT_MISMATCH');
    assert.equal(classify('tb.v:4: error: Wrong number of ports. Expecting 4, got 3.', 'compile').category, 'PORT_MISMATCH');
});

test('the first matching line decides the category', () => {
    const raw = 'top.v:2: error: Unable to bind wire/reg/memory `carry\'\ntop.v:5: syntax error';
    assert.equal(classify(raw, 'compile').category, 'UNRESOLVED_REFERENCE');
});

test('unrecognised output is UNKNOWN with the raw text verbatim', () => {
    const raw = '  something odd happened\n';
    assert.deepEqual(classify(raw, 'compile'), { category: 'UNKNOWN', evidence: raw, phase: 'compile' });
});

test('timeout phase is always TIMEOUT', () => {
    assert.deepEqual(classify('  slow  ', 'timeout'), { category: 'TIMEOUT', evidence: 'slow', phase: 'timeout' });
});

test('evidence is capped', () => {
    const d = classify('syntax error here at line', 'compile', { contextLines: 0, maxEvidenceChars: 10, maxFailingVectors: 8 });
    assert.equal(d.evidence, 'syntax err\n...[truncated 15 chars]');
});

test('failing vectors beyond the limit are counted, not listed', () => {
    const lines = Array.from({ length: 10 }, (_, i) => `[FAIL] vector ${i}`);
    const d = diagnoseFailure({ status: 'LOGIC_ERROR', diagnostic: lines.join('\n'), evidence: lines });
    assert.equal(d.category, 'ASSERTION_FAILURE');
    assert.equal(d.phase, 'simulate');
    assert.equal(d.evidence, [...lines.slice(0, 8), '(2 more failing vectors)'].join('\n'));
});

test('a few failing vectors are listed as-is', () => {
    const d = diagnoseFailure(logicError(['[FAIL] a=1 b=1 sum=1 expected 0']));
    assert.equal(d.evidence, '[FAIL] a=1 b=1 sum=1 expected 0');
});

test('LOGIC_ERROR without marker lines classifies its diagnostic', () => {
    const d = diagnoseFailure({ status: 'LOGIC_ERROR', diagnostic: 'Simulator exited with code 2.', evidence: [] });
    assert.deepEqual(d, { category: 'UNKNOWN', evidence: 'Simulator exited with code 2.', phase: 'simulate' });
});

test('phase follows the outcome status', () => {
    assert.equal(diagnoseFailure({ status: 'COMPILE_ERROR', diagnostic: 'x.v:1: syntax error' }).phase, 'compile');
    assert.equal(diagnoseFailure({ status: 'TIMEOUT', diagnostic: 'no [DONE]' }).category, 'TIMEOUT');
    assert.deepEqual(diagnoseFailure({ status: 'TOOL_UNAVAILABLE', diagnostic: 'Cannot run iverilog' }), {
        category: 'UNKNOWN',
        evidence: 'Cannot run iverilog',
        phase: 'compile',
    });
});

test('a pass has no diagnosis', () => {
    assert.equal(classifyOutcome(passed()), null);
});
