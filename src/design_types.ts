/**
 * Core data model for a design run.
 */

import type { StructuredError } from './structured_error';

export type PortDirection = 'input' | 'output' | 'inout';

export interface Port {
    readonly name: string;
    readonly direction: PortDirection;
    /** Bit count, >= 1 */
    readonly width: number;
}

export interface DesignRequest {
    readonly prompt: string;
    /** Ports the top module must expose. */
    readonly interfaceHints?: readonly Port[];
    readonly topName?: string;
}

export interface PlanNode {
    readonly name: string;
    readonly ports: readonly Port[];
    readonly description: string;
    /** Names of the nodes this module instantiates. */
    readonly dependencies: readonly string[];
}

export interface DesignPlan {
    /** Declaration order, as decomposed. */
    readonly nodes: readonly PlanNode[];
    /** Dependency-first topological order; `top` is last. */
    readonly order: readonly string[];
    readonly top: string;
}

export interface VerifiedModule {
    readonly name: string;
    readonly ports: readonly Port[];
    readonly implementation: string;
    readonly harness: string;
    readonly dependencies: readonly string[];
}

/* -------------------------------------------------------------------------- */
/* Verification                                                               */
/* -------------------------------------------------------------------------- */

export type VerificationOutcome =
    | { readonly status: 'PASSED'; readonly log: string; readonly vectorsPassed: number }
    | { readonly status: 'COMPILE_ERROR'; readonly diagnostic: string }
    | {
          readonly status: 'LOGIC_ERROR';
          readonly diagnostic: string;
          readonly evidence: readonly string[];
          /** Set when an outside signal ended the simulator */
          readonly termSignal?: string;
      }
    | { readonly status: 'TIMEOUT'; readonly diagnostic: string }
    | { readonly status: 'TOOL_UNAVAILABLE'; readonly diagnostic: string };

export type OutcomeStatus = VerificationOutcome['status'];

export type FailedOutcome = Exclude<VerificationOutcome, { readonly status: 'PASSED' }>;

export type FailureCategory =
    | 'SYNTAX_ERROR'
    | 'UNRESOLVED_REFERENCE'
    | 'PORT_MISMATCH'
    | 'ASSERTION_FAILURE'
    | 'TIMEOUT'
    | 'UNKNOWN';

export type DiagnosticPhase = 'generate' | 'compile' | 'simulate' | 'timeout';

export interface Diagnosis {
    readonly category: FailureCategory;
    readonly evidence: string;
    readonly phase: DiagnosticPhase;
}

export interface Attempt {
    /** 1-based */
    readonly index: number;
    readonly implementation: string;
    readonly harness: string;
    readonly outcome: VerificationOutcome;
    /** null when the attempt passed */
    readonly diagnosis: Diagnosis | null;
    readonly startedAt: string;
    readonly durationMs: number;
}

/* -------------------------------------------------------------------------- */
/* Results                                                                    */
/* -------------------------------------------------------------------------- */

export type ModuleResult =
    | { readonly status: 'VERIFIED'; readonly name: string; readonly module: VerifiedModule; readonly attempts: readonly Attempt[] }
    | { readonly status: 'EXHAUSTED'; readonly name: string; readonly lastDiagnosis: Diagnosis; readonly attempts: readonly Attempt[] }
    | { readonly status: 'ABORTED'; readonly name: string; readonly reason: string; readonly attempts: readonly Attempt[] };

export interface FailedNode {
    readonly name: string;
    /** null when the node was aborted by an internal error rather than exhausted */
    readonly lastDiagnosis: Diagnosis | null;
    readonly reason: string;
}

export interface IntegratedDesign {
    readonly top: string;
    /** All verified modules, dependencies first, top last. */
    readonly source: string;
    readonly modules: readonly VerifiedModule[];
    readonly harnesses: Readonly<Record<string, string>>;
    readonly hierarchy: string;
}

interface DesignResultBase {
    readonly runId: string;
    readonly plan: DesignPlan | null;
    readonly modules: readonly ModuleResult[];
    readonly startedAt: string;
    readonly durationMs: number;
}

export type DesignResult =
    | (DesignResultBase & { readonly status: 'VERIFIED'; readonly design: IntegratedDesign })
    | (DesignResultBase & { readonly status: 'PARTIALLY_FAILED'; readonly failed: readonly FailedNode[]; readonly skipped: readonly string[] })
    | (DesignResultBase & {
        readonly status: 'ABORTED';
        readonly reason: string;
        readonly error: StructuredError | null;
        readonly aborted: readonly string[];
        readonly failed: readonly FailedNode[];
        readonly skipped: readonly string[];
    });

export const VERILOG_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;
