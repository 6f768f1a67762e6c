/**
 * Unified line diff between consecutive attempts of a module.
 */

export interface DiffOptions {
    fromLabel?: string;
    toLabel?: string;
    /** Unchanged lines shown around each change */
    context?: number;
}

interface DiffLine {
    kind: ' ' | '-' | '+';
    text: string;
    /** Old / new lines consumed before this one */
    a: number;
    b: number;
}

const MAX_LCS_CELLS = 4_000_000;

function splitLines(text: string): string[] {
    if (text.length === 0) return [];
    const lines = text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

function lineDiff(a: readonly string[], b: readonly string[]): DiffLine[] {
    const out: DiffLine[] = [];

    if ((a.length + 1) * (b.length + 1) > MAX_LCS_CELLS) {
        // Too large to align: whole-file replacement
        a.forEach((text, i) => out.push({ kind: '-', text, a: i, b: 0 }));
        b.forEach((text, j) => out.push({ kind: '+', text, a: a.length, b: j }));
        return out;
    }

    // lcs[i][j] = LCS length of a[i..] and b[j..]
    const width = b.length + 1;
    const lcs = new Uint32Array((a.length + 1) * width);
    for (let i = a.length - 1; i >= 0; i--) {
        for (let j = b.length - 1; j >= 0; j--) {
            lcs[i * width + j] = a[i] === b[j]
                ? lcs[(i + 1) * width + j + 1] + 1
                : Math.max(lcs[(i + 1) * width + j], lcs[i * width + j + 1]);
        }
    }

    let i = 0;
    let j = 0;
    while (i < a.length || j < b.length) {
        if (i < a.length && j < b.length && a[i] === b[j]) {
            out.push({ kind: ' ', text: a[i], a: i, b: j });
            i++;
            j++;
        } else if (j >= b.length || (i < a.length && lcs[(i + 1) * width + j] >= lcs[i * width + j + 1])) {
            out.push({ kind: '-', text: a[i], a: i, b: j });
            i++;
        } else {
            out.push({ kind: '+', text: b[j], a: i, b: j });
            j++;
        }
    }
    return out;
}

function hunkHeader(lines: readonly DiffLine[]): string {
    const aLen = lines.filter(l => l.kind !== '+').length;
    const bLen = lines.filter(l => l.kind !== '-').length;
    const aStart = aLen > 0 ? lines[0].a + 1 : lines[0].a;
    const bStart = bLen > 0 ? lines[0].b + 1 : lines[0].b;
    return `@@ -${aStart},${aLen} +${bStart},${bLen} @@`;
}

export function unifiedDiff(previous: string, next: string, options: DiffOptions = {}): string {
    const context = options.context ?? 3;
    const lines = lineDiff(splitLines(previous), splitLines(next));

    const changed = lines.flatMap((l, idx) => (l.kind === ' ' ? [] : [idx]));
    if (changed.length === 0) return '';

    // Group changes whose gap fits inside shared context
    const ranges: Array<[number, number]> = [];
    for (const idx of changed) {
        const last = ranges[ranges.length - 1];
        if (last && idx - last[1] <= 2 * context + 1) {
            last[1] = idx;
        } else {
            ranges.push([idx, idx]);
        }
    }

    const out = [`--- ${options.fromLabel ?? 'previous'}`, `+++ ${options.toLabel ?? 'next'}`];
    for (const [first, last] of ranges) {
        const hunk = lines.slice(Math.max(0, first - context), Math.min(lines.length, last + context + 1));
        out.push(hunkHeader(hunk));
        for (const l of hunk) out.push(`${l.kind}${l.text}`);
    }
    return `${out.join('\n')}\n`;
}

export interface DiffableAttempt {
    index: number;
    implementation: string;
}

/** Diff of the implementation text; '' when nothing changed. */
export function diffAttempts(previous: DiffableAttempt, next: DiffableAttempt, context = 3): string {
    return unifiedDiff(previous.implementation, next.implementation, {
        fromLabel: `attempt ${previous.index}`,
        toLabel: `attempt ${next.index}`,
        context,
    });
}
