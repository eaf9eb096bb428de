const SAFE_WORD = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quotes one argument for a POSIX shell inside the sandbox.
 */
export function quoteArg(value: string): string {
    if (value.length > 0 && SAFE_WORD.test(value)) return value;
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function buildCommand(program: string, args: readonly string[]): string {
    return [program, ...args].map(quoteArg).join(" ");
}

export function formatSize(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}KB`;
    return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}
