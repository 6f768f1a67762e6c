/**
 * Subprocess execution with hard-kill timeouts.
 *
 * A process that outlives its timeout, or whose run is cancelled, gets
 * SIGKILL; there is no graceful shutdown path. Each output stream keeps
 * at most `maxOutputBytes`; the rest is counted and dropped.
 */

import { spawn } from 'child_process';

export interface ProcessOptions {
    cwd?: string;
    timeoutMs: number;
    signal?: AbortSignal;
    env?: NodeJS.ProcessEnv;
    /** Bytes kept per stream (default 1 MiB) */
    maxOutputBytes?: number;
}

export const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export interface ProcessResult {
    exitCode: number | null;
    /** Signal that terminated the process, if any */
    termSignal: NodeJS.Signals | null;
    stdout: string;
    stderr: string;
    timedOut: boolean;
    aborted: boolean;
    /** Bytes discarded past the per-stream cap, stdout and stderr combined */
    droppedBytes: number;
    /** Set when the process could not be started at all */
    spawnError: { code: string; message: string } | null;
    durationMs: number;
}

export type ProcessRunner = (command: string, args: readonly string[], options: ProcessOptions) => Promise<ProcessResult>;

function errnoCode(err: Error): string {
    const code: unknown = Reflect.get(err, 'code');
    return typeof code === 'string' ? code : 'UNKNOWN';
}

class CappedBuffer {
    private readonly chunks: Buffer[] = [];
    private kept = 0;
    dropped = 0;

    constructor(private readonly limit: number) {}

    push(chunk: Buffer): void {
        const room = this.limit - this.kept;
        if (room <= 0) {
            this.dropped += chunk.length;
            return;
        }
        const part = chunk.length > room ? chunk.subarray(0, room) : chunk;
        this.chunks.push(part);
        this.kept += part.length;
        this.dropped += chunk.length - part.length;
    }

    toString(): string {
        return Buffer.concat(this.chunks, this.kept).toString('utf8');
    }
}

export const runProcess: ProcessRunner = (command, args, options) => {
    const started = Date.now();

    return new Promise<ProcessResult>((resolve) => {
        const limit = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
        const stdout = new CappedBuffer(limit);
        const stderr = new CappedBuffer(limit);
        let timedOut = false;
        let aborted = false;
        let settled = false;

        const child = spawn(command, [...args], {
            cwd: options.cwd,
            env: options.env ?? process.env,
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        const kill = (): void => {
            if (child.exitCode === null && child.signalCode === null) child.kill('SIGKILL');
        };

        const timer = setTimeout(() => {
            timedOut = true;
            kill();
        }, options.timeoutMs);

        const onAbort = (): void => {
            aborted = true;
            kill();
        };
        if (options.signal) {
            if (options.signal.aborted) onAbort();
            else options.signal.addEventListener('abort', onAbort, { once: true });
        }

        const finish = (result: Omit<ProcessResult, 'stdout' | 'stderr' | 'timedOut' | 'aborted' | 'droppedBytes' | 'durationMs'>): void => {
            if (settled) return;
            settled = true;
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onAbort);
            resolve({
                ...result,
                stdout: stdout.toString(),
                stderr: stderr.toString(),
                timedOut,
                aborted,
                droppedBytes: stdout.dropped + stderr.dropped,
                durationMs: Date.now() - started,
            });
        };

        child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

        child.on('error', (err: Error) => {
            finish({
                exitCode: null,
                termSignal: null,
                spawnError: { code: errnoCode(err), message: err.message },
            });
        });

        child.on('close', (code: number | null, termSignal: NodeJS.Signals | null) => {
            finish({ exitCode: code, termSignal, spawnError: null });
        });
    });
};
