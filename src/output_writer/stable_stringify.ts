// src/output_writer/stable_stringify.ts

// JSON with object keys sorted at every level, so equal manifests hash equal.
export function stableStringify(value: unknown): string {
    if (value === null) return "null";

    if (typeof value === "number" || typeof value === "boolean" || typeof value === "string") {
        return JSON.stringify(value);
    }

    if (Array.isArray(value)) {
        return "[" + value.map(stableStringify).join(",") + "]";
    }

    if (typeof value === "object") {
        const entries = Object.entries(value)
            .filter(([, v]) => v !== undefined)
            .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") + "}";
    }

    // undefined, function, symbol, bigint
    throw new Error("UNSUPPORTED_JSON_TYPE");
}
