import { format, isValid, subHours } from 'date-fns';
import type { ReadingWindow } from '../types';

export const DEFAULT_WINDOW_HOURS = 24;

/**
 * The readings window ending at `now`. Both ends are inclusive.
 */
export function defaultWindow(now: Date = new Date(), hours = DEFAULT_WINDOW_HOURS): ReadingWindow {
    return { start: subHours(now, hours), end: now };
}

export function resolveWindow(start?: Date, end?: Date, now: Date = new Date()): ReadingWindow {
    const resolvedEnd = end ?? now;
    const resolvedStart = start ?? subHours(resolvedEnd, DEFAULT_WINDOW_HOURS);

    if (!isValid(resolvedStart) || !isValid(resolvedEnd)) {
        throw new RangeError('Readings window has an invalid date');
    }
    if (resolvedStart.getTime() > resolvedEnd.getTime()) {
        throw new RangeError(`Readings window starts after it ends (${resolvedStart.toISOString()} > ${resolvedEnd.toISOString()})`);
    }
    return { start: resolvedStart, end: resolvedEnd };
}

export const isInWindow = (timestampMs: number, window: ReadingWindow) =>
    timestampMs >= window.start.getTime() && timestampMs <= window.end.getTime();

/**
 * Formats a UTC ISO timestamp as `yyyy-MM-dd HH:mm:ss` without shifting it
 * into the browser's zone.
 */
export function formatTimestamp(iso: string | null | undefined): string {
    if (!iso) return '-';
    const d = new Date(iso);
    if (isNaN(d.getTime())) return String(iso);
    return d.toISOString().slice(0, 19).replace('T', ' ');
}

/** Short local time for chart axes. */
export function formatAxisTime(iso: string): string {
    const d = new Date(iso);
    return isValid(d) ? format(d, 'HH:mm') : iso;
}

export function formatFileDate(date: Date = new Date()): string {
    return format(date, 'yyyy-MM-dd');
}
