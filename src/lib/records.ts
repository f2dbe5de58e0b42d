// Helpers for reading loosely-typed JSON from the monitoring API.

export const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** Some API fields arrive as an array when a station has several values. */
export const firstOf = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value);

export function optionalString(value: unknown): string | undefined {
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    return trimmed ? trimmed : undefined;
}
