import test from 'node:test';
import assert from 'node:assert/strict';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { RunLedger } from '../src/run_ledger';
import { LedgerError } from '../src/structured_error';
import type { Attempt } from '../src/design_types';

function attempt(index: number, passedRun: boolean): Attempt {
  return {
    index,
    implementation: `module m; // ${index}\nendmodule`,
    harness: 'module tb_m; endmodule',
    outcome: passedRun
      ? { status: 'PASSED', log: '[PASS] a\n[DONE]', vectorsPassed: 1 }
      : { status: 'COMPILE_ERROR', diagnostic: 'm.v:1: syntax error' },
    diagnosis: passedRun ? null : { category: 'SYNTAX_ERROR', evidence: 'm.v:1: syntax error', phase: 'compile' },
    startedAt: '2026-01-02T03:04:05.000Z',
    durationMs: 12.6,
  };
}

test('records a run with its modules and attempts', () => {
  const ledger = new RunLedger(':memory:');
  ledger.startRun('run-1', { prompt: 'counter', provider: 'ollama', model: 'codellama' });

  const first = attempt(1, false);
  const second = attempt(2, true);
  ledger.recordAttempt('run-1', 'm', first);
  ledger.recordAttempt('run-1', 'm', second);
  ledger.finishModule('run-1', {
    status: 'VERIFIED',
    name: 'm',
    module: { name: 'm', ports: [], implementation: second.implementation, harness: second.harness, dependencies: [] },
    attempts: [first, second],
  });
  ledger.finishRun('run-1', 'VERIFIED');

  const run = ledger.getRun('run-1');
  assert.ok(run);
  assert.equal(run.status, 'VERIFIED');
  assert.equal(run.prompt, 'counter');
  assert.equal(run.provider, 'ollama');
  assert.equal(run.model, 'codellama');
  assert.equal(run.reason, null);
  assert.ok(run.finishedAt);

  assert.deepEqual(ledger.getModules('run-1'), [{ name: 'm', status: 'VERIFIED', attempts: 2, lastCategory: null }]);

  const attempts = ledger.getAttempts('run-1', 'm');
  assert.deepEqual(attempts.map(a => [a.index, a.status, a.category]), [
    [1, 'COMPILE_ERROR', 'SYNTAX_ERROR'],
    [2, 'PASSED', null],
  ]);
  assert.equal(attempts[0].evidence, 'm.v:1: syntax error');
  assert.equal(attempts[0].durationMs, 13);
  ledger.close();
});

test('module rows are updated in place', () => {
  const ledger = new RunLedger(':memory:');
  ledger.startRun('run-1', { prompt: 'p' });
  ledger.finishModule('run-1', { status: 'ABORTED', name: 'm', reason: 'Run aborted', attempts: [] });
  ledger.finishModule('run-1', {
    status: 'EXHAUSTED',
    name: 'm',
    lastDiagnosis: { category: 'TIMEOUT', evidence: 'slow', phase: 'timeout' },
    attempts: [attempt(1, false)],
  });

  assert.deepEqual(ledger.getModules('run-1'), [{ name: 'm', status: 'EXHAUSTED', attempts: 1, lastCategory: 'TIMEOUT' }]);
  ledger.close();
});

test('an attempt is written once', () => {
  const ledger = new RunLedger(':memory:');
  ledger.startRun('run-1', { prompt: 'p' });
  ledger.recordAttempt('run-1', 'm', attempt(1, false));
  assert.throws(() => ledger.recordAttempt('run-1', 'm', attempt(1, true)), LedgerError);
  ledger.close();
});

test('writes against an unknown run fail', () => {
  const ledger = new RunLedger(':memory:');
  assert.throws(
    () => ledger.finishRun('missing', 'ABORTED', 'x'),
    (err: unknown) => err instanceof LedgerError && err.message === 'Unknown run: missing'
  );
  assert.throws(() => ledger.recordAttempt('missing', 'm', attempt(1, true)), LedgerError);
  assert.equal(ledger.getRun('missing'), null);
  ledger.close();
});

test('a file ledger survives reopening', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rtlforge-ledger-'));
  const dbPath = path.join(dir, 'nested', 'ledger.db');

  const first = new RunLedger(dbPath);
  first.startRun('run-1', { prompt: 'p' });
  first.finishRun('run-1', 'ABORTED', 'Planning failed: x');
  first.close();

  const second = new RunLedger(dbPath);
  assert.equal(second.getRun('run-1')?.reason, 'Planning failed: x');
  second.close();

  fs.rmSync(dir, { recursive: true, force: true });
});

test('an unusable ledger path is a LedgerError', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'rtlforge-ledger-'));
  const blocker = path.join(dir, 'blocker');
  fs.writeFileSync(blocker, '');
  const dbPath = path.join(blocker, 'sub', 'rtl.db');

  assert.throws(
    () => new RunLedger(dbPath),
    (err: unknown) => err instanceof LedgerError && err.message.startsWith(`Cannot open ledger at ${dbPath}: `)
  );

  fs.rmSync(dir, { recursive: true, force: true });
});
