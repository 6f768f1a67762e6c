/**
 * Dependency-graph helpers over plan nodes.
 *
 * Edges point from a module to the modules it instantiates. All helpers
 * assume dependency names were already resolved against the node set.
 */

import type { DesignPlan, PlanNode } from './design_types';

type Graph = ReadonlyMap<string, readonly string[]>;

export function toGraph(nodes: readonly PlanNode[]): Map<string, readonly string[]> {
    return new Map(nodes.map(n => [n.name, n.dependencies] as const));
}

/**
 * Kahn's algorithm. Among nodes that become ready together, declaration
 * order wins. Returns the order and the nodes that could not be placed
 * (non-empty only when the graph has a cycle).
 */
export function topologicalOrder(nodes: readonly PlanNode[]): { order: string[]; blocked: string[] } {
    const remaining = new Map(nodes.map(n => [n.name, new Set(n.dependencies)] as const));
    const order: string[] = [];

    let progressed = true;
    while (remaining.size > 0 && progressed) {
        progressed = false;
        for (const node of nodes) {
            const pending = remaining.get(node.name);
            if (!pending || pending.size > 0) continue;

            order.push(node.name);
            remaining.delete(node.name);
            for (const deps of remaining.values()) deps.delete(node.name);
            progressed = true;
            break;
        }
    }

    return { order, blocked: [...remaining.keys()] };
}

/** First cycle found by depth-first search, as a closed path (`a, b, a`). */
export function findCycle(graph: Graph): string[] | null {
    const WHITE = 0, GREY = 1, BLACK = 2;
    const color = new Map<string, number>();
    const stack: string[] = [];

    const visit = (name: string): string[] | null => {
        color.set(name, GREY);
        stack.push(name);
        for (const dep of graph.get(name) ?? []) {
            const c = color.get(dep) ?? WHITE;
            if (c === GREY) {
                return [...stack.slice(stack.indexOf(dep)), dep];
            }
            if (c === WHITE) {
                const found = visit(dep);
                if (found) return found;
            }
        }
        stack.pop();
        color.set(name, BLACK);
        return null;
    };

    for (const name of graph.keys()) {
        if ((color.get(name) ?? WHITE) === WHITE) {
            const found = visit(name);
            if (found) return found;
        }
    }
    return null;
}

/** Nodes nothing else instantiates, in declaration order. */
export function findSinks(nodes: readonly PlanNode[]): string[] {
    const instantiated = new Set(nodes.flatMap(n => n.dependencies));
    return nodes.filter(n => !instantiated.has(n.name)).map(n => n.name);
}

/** Everything `name` instantiates, directly or indirectly, in plan order. */
export function transitiveDependencies(plan: DesignPlan, name: string): string[] {
    const graph = toGraph(plan.nodes);
    const seen = new Set<string>();
    const walk = (current: string): void => {
        for (const dep of graph.get(current) ?? []) {
            if (!seen.has(dep)) {
                seen.add(dep);
                walk(dep);
            }
        }
    };
    walk(name);
    return plan.order.filter(n => seen.has(n));
}

/** Everything that instantiates `name`, directly or indirectly, in plan order. */
export function transitiveDependents(plan: DesignPlan, name: string): string[] {
    const dependents = new Map<string, string[]>();
    for (const node of plan.nodes) {
        for (const dep of node.dependencies) {
            const list = dependents.get(dep) ?? [];
            list.push(node.name);
            dependents.set(dep, list);
        }
    }
    const seen = new Set<string>();
    const walk = (current: string): void => {
        for (const parent of dependents.get(current) ?? []) {
            if (!seen.has(parent)) {
                seen.add(parent);
                walk(parent);
            }
        }
    };
    walk(name);
    return plan.order.filter(n => seen.has(n));
}
