/**
 * Verification Runner - compile + simulate one candidate against its harness.
 *
 * Two ordered subprocess phases in a fresh working directory per call.
 * Exactly one VerificationOutcome comes back; a pass needs the harness's
 * explicit completion marker, never just a quiet log.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from './logger';
import { errorMessage } from './structured_error';
import { runProcess, ProcessRunner, ProcessResult } from './process_runner';
import type { VerificationOutcome } from './design_types';

const log = createLogger('runner');

export const SIMULATION_MARKERS = {
    PASS: '[PASS]',
    FAIL: '[FAIL]',
    DONE: '[DONE]',
} as const;

const SYSTEM_TASK_FAILURE = /^\s*(ERROR|FATAL):/;

export interface LibrarySource {
    name: string;
    source: string;
}

export interface VerificationInput {
    moduleName: string;
    implementation: string;
    harness: string;
    /** Verified dependency sources compiled alongside the candidate */
    librarySources: readonly LibrarySource[];
}

export interface VerifyOptions {
    /** Simulation wall-clock limit */
    timeoutMs: number;
    signal?: AbortSignal;
}

export interface VerificationRunner {
    verify(input: VerificationInput, options: VerifyOptions): Promise<VerificationOutcome>;
}

/* -------------------------------------------------------------------------- */
/* Marker protocol                                                            */
/* -------------------------------------------------------------------------- */

export interface SimulationReport {
    passed: string[];
    failed: string[];
    done: boolean;
}

export function parseSimulationLog(text: string): SimulationReport {
    const report: SimulationReport = { passed: [], failed: [], done: false };
    for (const rawLine of text.split(/\r?\n/)) {
        const line = rawLine.trim();
        if (line.startsWith(SIMULATION_MARKERS.PASS)) report.passed.push(line);
        else if (line.startsWith(SIMULATION_MARKERS.FAIL) || SYSTEM_TASK_FAILURE.test(line)) report.failed.push(line);
        else if (line.startsWith(SIMULATION_MARKERS.DONE)) report.done = true;
    }
    return report;
}

function combinedOutput(result: Pick<ProcessResult, 'stdout' | 'stderr'> & Partial<Pick<ProcessResult, 'droppedBytes'>>): string {
    const parts = [result.stdout.trim(), result.stderr.trim()].filter(p => p.length > 0);
    if (result.droppedBytes) parts.push(`[output truncated: ${result.droppedBytes} bytes dropped]`);
    return parts.join('\n');
}

/**
 * Map a finished simulation to an outcome. Order matters: a killed run is a
 * timeout even if it printed failures first.
 */
export function interpretSimulation(
    result: Pick<ProcessResult, 'stdout' | 'stderr' | 'exitCode' | 'timedOut' | 'aborted'>
        & Partial<Pick<ProcessResult, 'termSignal' | 'droppedBytes'>>,
    timeoutMs: number
): VerificationOutcome {
    const output = combinedOutput(result);

    if (result.aborted) {
        return { status: 'TIMEOUT', diagnostic: `Simulation cancelled before completion.\n${output}`.trim() };
    }
    if (result.timedOut) {
        return {
            status: 'TIMEOUT',
            diagnostic: `Simulation exceeded ${timeoutMs}ms without the ${SIMULATION_MARKERS.DONE} marker. Likely a missing $finish or a clock that never stops.\n${output}`.trim(),
        };
    }

    const report = parseSimulationLog(result.stdout);
    if (report.failed.length > 0) {
        return { status: 'LOGIC_ERROR', diagnostic: output, evidence: report.failed };
    }
    if (result.exitCode === null && result.termSignal) {
        return {
            status: 'LOGIC_ERROR',
            diagnostic: `Simulator terminated by signal ${result.termSignal}.\n${output}`.trim(),
            evidence: [],
            termSignal: result.termSignal,
        };
    }
    if (result.exitCode !== 0) {
        return { status: 'LOGIC_ERROR', diagnostic: `Simulator exited with code ${result.exitCode}.\n${output}`.trim(), evidence: [] };
    }
    if (!report.done) {
        return {
            status: 'TIMEOUT',
            diagnostic: `Simulation ended without the ${SIMULATION_MARKERS.DONE} completion marker.\n${output}`.trim(),
        };
    }
    if (report.passed.length === 0) {
        return {
            status: 'LOGIC_ERROR',
            diagnostic: `Testbench reported no ${SIMULATION_MARKERS.PASS} vectors before ${SIMULATION_MARKERS.DONE}.\n${output}`.trim(),
            evidence: [],
        };
    }
    return { status: 'PASSED', log: output, vectorsPassed: report.passed.length };
}

/* -------------------------------------------------------------------------- */
/* Icarus Verilog runner                                                      */
/* -------------------------------------------------------------------------- */

export interface IcarusRunnerConfig {
    /** Parent of the per-attempt working directories */
    workRoot: string;
    compiler?: string;
    simulator?: string;
    compileArgs?: readonly string[];
    compileTimeoutMs: number;
    keepWorkDirs?: boolean;
    processRunner?: ProcessRunner;
}

const SIM_IMAGE = 'sim.vvp';

export class IcarusVerificationRunner implements VerificationRunner {
    private readonly compiler: string;
    private readonly simulator: string;
    private readonly compileArgs: readonly string[];
    private readonly exec: ProcessRunner;

    constructor(private readonly config: IcarusRunnerConfig) {
        this.compiler = config.compiler ?? 'iverilog';
        this.simulator = config.simulator ?? 'vvp';
        this.compileArgs = config.compileArgs ?? ['-g2005'];
        this.exec = config.processRunner ?? runProcess;
    }

    async verify(input: VerificationInput, options: VerifyOptions): Promise<VerificationOutcome> {
        let workDir: string;
        let files: string[];
        try {
            workDir = await this.createWorkDir(input.moduleName);
            files = await this.writeSources(workDir, input);
        } catch (e) {
            log.error(`Cannot prepare working directory`, { module: input.moduleName, error: errorMessage(e) });
            return { status: 'TOOL_UNAVAILABLE', diagnostic: `Cannot prepare working directory: ${errorMessage(e)}` };
        }

        try {
            return await this.compileAndSimulate(workDir, files, input.moduleName, options);
        } finally {
            if (!this.config.keepWorkDirs) {
                await fs.promises.rm(workDir, { recursive: true, force: true }).catch((e: unknown) => {
                    log.warn(`Working directory cleanup failed`, { dir: workDir, error: errorMessage(e) });
                });
            }
        }
    }

    private async compileAndSimulate(
        workDir: string,
        files: string[],
        moduleName: string,
        options: VerifyOptions
    ): Promise<VerificationOutcome> {
        const compile = await this.exec(
            this.compiler,
            [...this.compileArgs, '-o', SIM_IMAGE, ...files],
            { cwd: workDir, timeoutMs: this.config.compileTimeoutMs, signal: options.signal }
        );

        if (compile.spawnError) {
            return this.unavailable(this.compiler, compile.spawnError);
        }
        if (compile.timedOut || compile.aborted) {
            return {
                status: 'TIMEOUT',
                diagnostic: compile.aborted
                    ? 'Compilation cancelled.'
                    : `Compilation exceeded ${this.config.compileTimeoutMs}ms.`,
            };
        }
        if (compile.exitCode !== 0) {
            log.debug(`Compile failed`, { module: moduleName, exit: compile.exitCode });
            return { status: 'COMPILE_ERROR', diagnostic: combinedOutput(compile) || `${this.compiler} exited with code ${compile.exitCode}` };
        }

        const sim = await this.exec(
            this.simulator,
            ['-n', SIM_IMAGE],
            { cwd: workDir, timeoutMs: options.timeoutMs, signal: options.signal }
        );

        if (sim.spawnError) {
            return this.unavailable(this.simulator, sim.spawnError);
        }

        const outcome = interpretSimulation(sim, options.timeoutMs);
        log.debug(`Simulation finished`, { module: moduleName, status: outcome.status, ms: sim.durationMs });
        return outcome;
    }

    private unavailable(tool: string, err: { code: string; message: string }): VerificationOutcome {
        const hint = err.code === 'ENOENT' ? ` (is ${tool} installed and on PATH?)` : '';
        log.error(`Toolchain unavailable`, { tool, code: err.code });
        return { status: 'TOOL_UNAVAILABLE', diagnostic: `Cannot run ${tool}: ${err.message}${hint}` };
    }

    private async createWorkDir(moduleName: string): Promise<string> {
        const root = this.config.workRoot || os.tmpdir();
        await fs.promises.mkdir(root, { recursive: true });
        return fs.promises.mkdtemp(path.join(root, `${moduleName}-`));
    }

    private async writeSources(workDir: string, input: VerificationInput): Promise<string[]> {
        const files: string[] = [];
        for (const lib of input.librarySources) {
            const file = `lib_${lib.name}.v`;
            await fs.promises.writeFile(path.join(workDir, file), lib.source);
            files.push(file);
        }
        const design = `${input.moduleName}.v`;
        const harness = `${input.moduleName}_tb.v`;
        await fs.promises.writeFile(path.join(workDir, design), input.implementation);
        await fs.promises.writeFile(path.join(workDir, harness), input.harness);
        files.push(design, harness);
        return files;
    }
}
