/**
 * Diagnostic Classifier
 *
 * Reduces raw toolchain output to a category plus the smallest slice of
 * text that lets the next generation attempt fix the problem. Patterns
 * follow Icarus Verilog's wording.
 */

import { DIAGNOSTIC_LIMITS } from './config';
import type { Diagnosis, DiagnosticPhase, FailedOutcome, FailureCategory, VerificationOutcome } from './design_types';

export interface ClassifierLimits {
    contextLines: number;
    maxEvidenceChars: number;
    maxFailingVectors: number;
}

const DEFAULT_LIMITS: ClassifierLimits = {
    contextLines: DIAGNOSTIC_LIMITS.CONTEXT_LINES,
    maxEvidenceChars: DIAGNOSTIC_LIMITS.MAX_EVIDENCE_CHARS,
    maxFailingVectors: DIAGNOSTIC_LIMITS.MAX_FAILING_VECTORS,
};

interface Rule {
    category: FailureCategory;
    pattern: RegExp;
}

// Checked per line, in this order
const COMPILE_RULES: readonly Rule[] = [
    { category: 'SYNTAX_ERROR', pattern: /syntax error/i },
    { category: 'SYNTAX_ERROR', pattern: /malformed/i },
    { category: 'SYNTAX_ERROR', pattern: /invalid module item/i },
    { category: 'SYNTAX_ERROR', pattern: /syntax in assignment/i },
    { category: 'PORT_MISMATCH', pattern: /is not a port of/i },
    { category: 'PORT_MISMATCH', pattern: /wrong number of ports/i },
    { category: 'PORT_MISMATCH', pattern: /port\b.*\bexpects \d+ bits?/i },
    { category: 'UNRESOLVED_REFERENCE', pattern: /unknown module type/i },
    { category: 'UNRESOLVED_REFERENCE', pattern: /unable to bind/i },
    { category: 'UNRESOLVED_REFERENCE', pattern: /not declared/i },
    { category: 'UNRESOLVED_REFERENCE', pattern: /undeclared/i },
];

const SIMULATE_RULES: readonly Rule[] = [
    { category: 'ASSERTION_FAILURE', pattern: /^\s*\[FAIL\]/ },
    { category: 'ASSERTION_FAILURE', pattern: /^\s*(ERROR|FATAL):/ },
];

function cap(text: string, maxChars: number): string {
    if (text.length <= maxChars) return text;
    return `${text.slice(0, maxChars)}\n...[truncated ${text.length - maxChars} chars]`;
}

function evidenceWindow(lines: readonly string[], index: number, limits: ClassifierLimits): string {
    const from = Math.max(0, index - limits.contextLines);
    const to = Math.min(lines.length, index + limits.contextLines + 1);
    return cap(lines.slice(from, to).join('\n'), limits.maxEvidenceChars);
}

function rulesFor(phase: DiagnosticPhase): readonly Rule[] {
    switch (phase) {
        case 'compile':
            return COMPILE_RULES;
        case 'simulate':
            return SIMULATE_RULES;
        default:
            return [];
    }
}

export function classify(
    raw: string,
    phase: DiagnosticPhase,
    limits: ClassifierLimits = DEFAULT_LIMITS
): Diagnosis {
    if (phase === 'timeout') {
        return { category: 'TIMEOUT', evidence: cap(raw.trim(), limits.maxEvidenceChars), phase };
    }

    const rules = rulesFor(phase);
    const lines = raw.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const rule = rules.find(r => r.pattern.test(lines[i]));
        if (rule) {
            return { category: rule.category, evidence: evidenceWindow(lines, i, limits), phase };
        }
    }

    // Unrecognised: hand the whole text on so nothing is lost
    return { category: 'UNKNOWN', evidence: raw, phase };
}

/**
 * Diagnose a failed outcome, picking the phase from its status.
 */
export function diagnoseFailure(
    outcome: FailedOutcome,
    limits: ClassifierLimits = DEFAULT_LIMITS
): Diagnosis {
    switch (outcome.status) {
        case 'COMPILE_ERROR':
        case 'TOOL_UNAVAILABLE':
            return classify(outcome.diagnostic, 'compile', limits);
        case 'TIMEOUT':
            return classify(outcome.diagnostic, 'timeout', limits);
        case 'LOGIC_ERROR': {
            if (outcome.evidence.length === 0) {
                return classify(outcome.diagnostic, 'simulate', limits);
            }
            const shown = outcome.evidence.slice(0, limits.maxFailingVectors);
            const rest = outcome.evidence.length - shown.length;
            const text = rest > 0 ? [...shown, `(${rest} more failing vectors)`].join('\n') : shown.join('\n');
            return { category: 'ASSERTION_FAILURE', evidence: cap(text, limits.maxEvidenceChars), phase: 'simulate' };
        }
    }
}

/** Null for PASSED. */
export function classifyOutcome(
    outcome: VerificationOutcome,
    limits: ClassifierLimits = DEFAULT_LIMITS
): Diagnosis | null {
    if (outcome.status === 'PASSED') return null;
    return diagnoseFailure(outcome, limits);
}
