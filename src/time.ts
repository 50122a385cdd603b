import { DateTime } from "luxon";

/** Source of "now" for every time-based rule. Injected so tests can move time. */
export type Clock = () => DateTime;

export const systemClock: Clock = () => DateTime.utc();

export function toIso(dt: DateTime): string {
    return dt.toUTC().toISO() ?? new Date(dt.toMillis()).toISOString();
}

export function fromIso(iso: string): DateTime {
    return DateTime.fromISO(iso, { zone: "utc" });
}

export function secondsBetween(earlierIso: string, later: DateTime): number {
    return later.diff(fromIso(earlierIso)).as("seconds");
}

export function isPast(deadlineIso: string, now: DateTime): boolean {
    return now.toMillis() > fromIso(deadlineIso).toMillis();
}
