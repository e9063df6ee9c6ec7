// src/stable_stringify.ts

/**
 * Canonical JSON: object keys sorted, no whitespace. Used for state hashes,
 * idempotency keys and trace lines, so equal values always give equal bytes.
 * Object properties holding `undefined` are skipped, as JSON.stringify does.
 */
export function stableStringify(value: unknown): string {
    if (value === null) return "null";
    const t = typeof value;

    if (t === "number") {
        if (!Number.isFinite(value)) throw new Error("NON_FINITE_NUMBER");
        return JSON.stringify(value);
    }
    if (t === "boolean" || t === "string") return JSON.stringify(value);

    if (Array.isArray(value)) {
        return "[" + value.map(stableStringify).join(",") + "]";
    }

    if (typeof value === "object" && value !== null) {
        const entries = Object.entries(value).filter(([, v]) => v !== undefined);
        entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)); // UTF-16 lex order like JS sort()
        return (
            "{" +
            entries.map(([k, v]) => JSON.stringify(k) + ":" + stableStringify(v)).join(",") +
            "}"
        );
    }

    // undefined, function, symbol, bigint
    throw new Error("UNSUPPORTED_JSON_TYPE");
}
