export interface SafeStringifyOptions {
    /** Truncate with '…(truncated)' suffix past this many characters */
    maxLen?: number | undefined;
    /** Indentation passed to JSON.stringify */
    indent?: number | undefined;
}

/**
 * Safe stringify that handles circular references, Errors and BigInt.
 */
export function safeStringify(value: unknown, options: SafeStringifyOptions = {}): string {
    const { maxLen, indent } = options;
    try {
        // Handle top-level BigInt without triggering JSON.stringify errors
        if (typeof value === 'bigint') {
            return value.toString();
        }
        const seen = new WeakSet<object>();
        const str = JSON.stringify(
            value,
            (_key, v: unknown) => {
                if (v instanceof Error) {
                    return { name: v.name, message: v.message };
                }
                if (typeof v === 'bigint') return v.toString();
                if (typeof v === 'object' && v !== null) {
                    if (seen.has(v)) return '[Circular]';
                    seen.add(v);
                }
                return v;
            },
            indent
        );
        if (typeof str === 'string') {
            if (maxLen !== undefined && maxLen > 0 && str.length > maxLen) {
                const indicator = '…(truncated)';
                if (maxLen <= indicator.length) {
                    return str.slice(0, maxLen);
                }
                return `${str.slice(0, maxLen - indicator.length)}${indicator}`;
            }
            return str;
        }
        return String(value);
    } catch {
        try {
            return String(value);
        } catch {
            return '[Unserializable value]';
        }
    }
}
