/**
 * Extraction of code and JSON from free-form model text.
 */

const FENCE = /```([A-Za-z0-9_+-]*)[ \t]*\r?\n([\s\S]*?)```/g;

interface FencedBlock {
    lang: string;
    body: string;
}

function fencedBlocks(text: string): FencedBlock[] {
    const blocks: FencedBlock[] = [];
    for (const match of text.matchAll(FENCE)) {
        blocks.push({ lang: match[1].toLowerCase(), body: match[2] });
    }
    return blocks;
}

/**
 * Pull HDL source out of a completion. Prefers a ```verilog block, then any
 * fenced block, then the whole text.
 */
export function extractCode(text: string): string {
    const blocks = fencedBlocks(text);
    const verilog = blocks.find(b => b.lang === 'verilog' || b.lang === 'systemverilog' || b.lang === 'v');
    if (verilog) return verilog.body.trim();
    if (blocks.length > 0) return blocks[0].body.trim();
    return text.trim();
}

/**
 * Parse a JSON object out of a completion (bare, fenced, or surrounded by prose).
 * Returns `undefined` when nothing parses; the caller owns the error.
 */
export function extractJson(text: string): unknown {
    const candidates: string[] = [text.trim()];
    for (const block of fencedBlocks(text)) candidates.push(block.body.trim());

    const first = text.indexOf('{');
    const last = text.lastIndexOf('}');
    if (first !== -1 && last > first) candidates.push(text.slice(first, last + 1));

    for (const candidate of candidates) {
        try {
            return JSON.parse(candidate);
        } catch {
            continue;
        }
    }
    return undefined;
}
