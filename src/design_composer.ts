/**
 * Design Composer - integrated top-level text from a fully verified plan.
 */

import type { DesignPlan, IntegratedDesign, VerifiedModule } from './design_types';

export interface VerifiedLookup {
    get(name: string): VerifiedModule | undefined;
}

/**
 * Indented tree of instantiations rooted at the top module. A module used
 * by several parents appears under each of them.
 */
export function renderHierarchy(plan: DesignPlan): string {
    const deps = new Map(plan.nodes.map(n => [n.name, n.dependencies]));
    const lines: string[] = [plan.top];

    const walk = (name: string, prefix: string): void => {
        const children = deps.get(name) ?? [];
        children.forEach((child, i) => {
            const last = i === children.length - 1;
            lines.push(`${prefix}${last ? '└── ' : '├── '}${child}`);
            walk(child, `${prefix}${last ? '    ' : '│   '}`);
        });
    };
    walk(plan.top, '');
    return lines.join('\n');
}

export function composeDesign(plan: DesignPlan, verified: VerifiedLookup): IntegratedDesign {
    const modules: VerifiedModule[] = plan.order.map(name => {
        const module = verified.get(name);
        if (!module) {
            throw new Error(`Cannot compose design: module ${name} is not verified`);
        }
        return module;
    });

    const header = [
        `// Top module: ${plan.top}`,
        `// Modules (dependency order): ${plan.order.join(', ')}`,
    ].join('\n');
    const source = `${header}\n\n${modules.map(m => m.implementation.trim()).join('\n\n')}\n`;

    const harnesses: Record<string, string> = {};
    for (const m of modules) harnesses[m.name] = m.harness;

    return Object.freeze({
        top: plan.top,
        source,
        modules,
        harnesses: Object.freeze(harnesses),
        hierarchy: renderHierarchy(plan),
    });
}
