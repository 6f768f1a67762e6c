/**
 * Prompt builders for generation calls.
 *
 * Each call is system framing + a task, plus optional verified-dependency
 * context and optional repair evidence from the previous attempt.
 */

import type { FailureCategory, VerifiedModule } from '../design_types';
import { formatPortList } from './format';

export { getSystemPrompt } from './system';
export { getDecompositionPrompt } from './decompose';
export { getImplementationTask } from './implementation';
export { getHarnessTask } from './harness';
export { formatPort, formatPortList } from './format';

export interface RepairEvidence {
    /** Index of the attempt that failed */
    attempt: number;
    category: FailureCategory;
    evidence: string;
    /** The code that produced the failure; shown for reference, never compiled again */
    previous: string;
}

export interface GenerationPrompt {
    system: string;
    task: string;
    context?: readonly VerifiedModule[];
    repair?: RepairEvidence | null;
}

export function renderContextBlock(context: readonly VerifiedModule[]): string {
    if (context.length === 0) return '';
    const entries = context.map(m =>
        `// ${m.name}: ${formatPortList(m.ports)}\n${m.implementation.trim()}`
    );
    return `--- Verified dependency modules (already compiled; instantiate, do not redefine) ---\n${entries.join('\n\n')}`;
}

export function renderRepairBlock(repair: RepairEvidence): string {
    const head = `--- Attempt ${repair.attempt} failed: ${repair.category} ---\n${repair.evidence.trim()}`;
    const code = repair.previous.trim().length > 0
        ? `\n\n--- Code from attempt ${repair.attempt} ---\n${repair.previous.trim()}`
        : '';
    return `${head}${code}\n\nFix the problem above and return the COMPLETE corrected code.`;
}

export function renderUserMessage(prompt: GenerationPrompt): string {
    const parts = [prompt.task.trim()];
    if (prompt.context && prompt.context.length > 0) parts.push(renderContextBlock(prompt.context));
    if (prompt.repair) parts.push(renderRepairBlock(prompt.repair));
    return parts.join('\n\n');
}
