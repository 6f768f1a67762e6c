/**
 * Memoises deterministic verification outcomes.
 *
 * Keyed by the SHA-256 of everything the toolchain sees. Outcomes that
 * depend on wall-clock or the host (TIMEOUT, TOOL_UNAVAILABLE, a simulator
 * killed by a signal) are never stored.
 */

import * as crypto from 'crypto';
import { LRUCache } from 'lru-cache';
import { createLogger } from './logger';
import type { VerificationOutcome } from './design_types';
import type { VerificationInput, VerificationRunner, VerifyOptions } from './verification_runner';

const log = createLogger('runner');

const DEFAULT_MAX_BYTES = 16 * 1024 * 1024;

export function verificationKey(input: VerificationInput): string {
    const hash = crypto.createHash('sha256');
    const field = (s: string) => {
        hash.update(String(Buffer.byteLength(s)));
        hash.update(':');
        hash.update(s);
    };
    field(input.moduleName);
    field(input.implementation);
    field(input.harness);
    for (const lib of input.librarySources) {
        field(lib.name);
        field(lib.source);
    }
    return hash.digest('hex');
}

function isCacheable(outcome: VerificationOutcome): boolean {
    if (outcome.status === 'LOGIC_ERROR') return outcome.termSignal === undefined;
    return outcome.status === 'PASSED' || outcome.status === 'COMPILE_ERROR';
}

function outcomeSize(outcome: VerificationOutcome): number {
    switch (outcome.status) {
        case 'PASSED':
            return Math.max(1, outcome.log.length);
        case 'LOGIC_ERROR':
            return Math.max(1, outcome.diagnostic.length + outcome.evidence.reduce((n, l) => n + l.length, 0));
        default:
            return Math.max(1, outcome.diagnostic.length);
    }
}

export interface VerificationCacheOptions {
    maxBytes?: number;
}

export class CachingVerificationRunner implements VerificationRunner {
    private readonly cache: LRUCache<string, VerificationOutcome>;
    private hits = 0;
    private misses = 0;

    constructor(private readonly inner: VerificationRunner, options: VerificationCacheOptions = {}) {
        this.cache = new LRUCache<string, VerificationOutcome>({
            maxSize: options.maxBytes ?? DEFAULT_MAX_BYTES,
            sizeCalculation: outcomeSize,
        });
    }

    async verify(input: VerificationInput, options: VerifyOptions): Promise<VerificationOutcome> {
        const key = verificationKey(input);
        const cached = this.cache.get(key);
        if (cached) {
            this.hits++;
            log.debug(`Verification cache hit`, { module: input.moduleName, status: cached.status });
            return cached;
        }

        this.misses++;
        const outcome = await this.inner.verify(input, options);
        if (isCacheable(outcome)) {
            this.cache.set(key, outcome);
        }
        return outcome;
    }

    stats(): { hits: number; misses: number; entries: number } {
        return { hits: this.hits, misses: this.misses, entries: this.cache.size };
    }
}
