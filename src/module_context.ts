/**
 * Module Context - the verified modules visible to later generation.
 *
 * Append-only: a module is added exactly once, right after it verifies, and
 * nothing is ever removed. Snapshots are frozen copies, so a node sees the
 * set that was verified when it started, regardless of what siblings add
 * while it runs.
 */

import type { VerifiedModule } from './design_types';

export interface ContextSnapshot {
    readonly size: number;
    has(name: string): boolean;
    get(name: string): VerifiedModule | undefined;
    /** Entries for `names`, in the order given; missing names are skipped. */
    select(names: readonly string[]): VerifiedModule[];
    names(): string[];
}

class FrozenSnapshot implements ContextSnapshot {
    private readonly entries: ReadonlyMap<string, VerifiedModule>;

    constructor(entries: Map<string, VerifiedModule>) {
        this.entries = new Map(entries);
    }

    get size(): number {
        return this.entries.size;
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    get(name: string): VerifiedModule | undefined {
        return this.entries.get(name);
    }

    select(names: readonly string[]): VerifiedModule[] {
        const out: VerifiedModule[] = [];
        for (const name of names) {
            const entry = this.entries.get(name);
            if (entry) out.push(entry);
        }
        return out;
    }

    names(): string[] {
        return [...this.entries.keys()];
    }
}

export class ModuleContext {
    private readonly entries = new Map<string, VerifiedModule>();

    get size(): number {
        return this.entries.size;
    }

    add(module: VerifiedModule): void {
        if (this.entries.has(module.name)) {
            throw new Error(`Module ${module.name} is already in the context`);
        }
        this.entries.set(module.name, Object.freeze({ ...module }));
    }

    has(name: string): boolean {
        return this.entries.has(name);
    }

    get(name: string): VerifiedModule | undefined {
        return this.entries.get(name);
    }

    snapshot(): ContextSnapshot {
        return new FrozenSnapshot(this.entries);
    }
}
