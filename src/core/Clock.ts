import { differenceInMilliseconds, isValid, parseISO } from "date-fns";
import { InvalidConfigError } from "./errors";

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Wall-clock source supplied by the host.
 */
export interface Clock {
    now(): Date;
}

export class SystemClock implements Clock {
    public now(): Date {
        return new Date();
    }
}

/**
 * Manually driven clock for tests and replays.
 */
export class ManualClock implements Clock {
    private current: Date;

    constructor(start: Date) {
        this.current = new Date(start.getTime());
    }

    public now(): Date {
        return new Date(this.current.getTime());
    }

    public set(date: Date): void {
        this.current = new Date(date.getTime());
    }

    public advanceDays(days: number): void {
        this.current = new Date(this.current.getTime() + days * MS_PER_DAY);
    }
}

/**
 * Elapsed milliseconds between two instants, never negative.
 */
export function elapsedMs(later: Date, earlier: Date): number {
    return Math.max(0, differenceInMilliseconds(later, earlier));
}

/**
 * Whole days in a millisecond span.
 */
export function toWholeDays(ms: number): number {
    return Math.floor(ms / MS_PER_DAY);
}

export function parseTimestamp(value: string, field: string): Date {
    const date = parseISO(value);
    if (!isValid(date)) {
        throw new InvalidConfigError(`${field} is not a valid ISO-8601 timestamp: "${value}"`);
    }
    return date;
}

export function assertValidDate(date: Date, field: string): void {
    if (!isValid(date)) {
        throw new InvalidConfigError(`${field} is not a valid date`);
    }
}

export function formatTimestamp(date: Date): string {
    return date.toISOString();
}
