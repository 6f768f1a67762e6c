/**
 * Structured Errors
 *
 * Typed error classes thrown across component boundaries, plus a
 * machine-readable record form that ends up in run results and the ledger.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type PlanningErrorCode =
    | 'CYCLIC_DEPENDENCY'
    | 'AMBIGUOUS_TOP'
    | 'UNPARSABLE_DECOMPOSITION';

export type GenerationErrorCode =
    | 'INVALID_REQUEST'
    | 'NETWORK_ERROR'
    | 'HTTP_ERROR'
    | 'RATE_LIMITED'
    | 'MALFORMED_RESPONSE'
    | 'CIRCUIT_OPEN';

export type ErrorCode =
    | PlanningErrorCode
    | GenerationErrorCode
    | 'CONFIG_ERROR'
    | 'LEDGER_ERROR'
    | 'RUN_TIMEOUT'
    | 'INTERNAL_ERROR';

export type Severity = 'FATAL' | 'ERROR' | 'WARNING';

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class RtlForgeError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'RtlForgeError';
    }

    toStructured(): StructuredError {
        return createStructuredError(this.code, this.message, this.context);
    }
}

/** The decomposition is unusable. Fatal to the run, never retried. */
export class PlanningError extends RtlForgeError {
    constructor(
        public readonly planningCode: PlanningErrorCode,
        message: string,
        context: Record<string, unknown> = {}
    ) {
        super(message, planningCode, context);
        this.name = 'PlanningError';
    }
}

export class GenerationError extends RtlForgeError {
    constructor(
        public readonly generationCode: GenerationErrorCode,
        message: string,
        public readonly retryable: boolean,
        context: Record<string, unknown> = {}
    ) {
        super(message, generationCode, context);
        this.name = 'GenerationError';
    }
}

export class ConfigError extends RtlForgeError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'CONFIG_ERROR', context);
        this.name = 'ConfigError';
    }
}

export class LedgerError extends RtlForgeError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super(message, 'LEDGER_ERROR', context);
        this.name = 'LedgerError';
    }
}

/* -------------------------------------------------------------------------- */
/* Builders                                                                   */
/* -------------------------------------------------------------------------- */

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {}
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        timestamp: new Date().toISOString(),
    };
}

function getSeverity(code: ErrorCode): Severity {
    const fatalCodes: ErrorCode[] = [
        'CYCLIC_DEPENDENCY',
        'AMBIGUOUS_TOP',
        'UNPARSABLE_DECOMPOSITION',
        'CONFIG_ERROR',
        'LEDGER_ERROR',
    ];

    const warningCodes: ErrorCode[] = [
        'RATE_LIMITED',
        'CIRCUIT_OPEN',
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/** Normalise anything thrown into a structured record. */
export function toStructuredError(err: unknown): StructuredError {
    if (err instanceof RtlForgeError) return err.toStructured();
    const message = err instanceof Error ? err.message : String(err);
    return createStructuredError('INTERNAL_ERROR', message);
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
