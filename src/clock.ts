import { setTimeout as delay } from "timers/promises"

export interface Clock {
    now(): Date
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export const systemClock: Clock = {
    now: () => new Date()
}

// Resolves early (instead of rejecting) when the signal fires, so callers only
// need to check `signal.aborted` after waking up.
export const sleep: Sleep = async (ms, signal) => {
    if (signal?.aborted) {
        return
    }
    try {
        await delay(ms, undefined, { signal })
    } catch (e) {
        if (!isAbortError(e)) {
            throw e
        }
    }
}

export function isAbortError(candidate: unknown): boolean {
    return candidate instanceof Error && candidate.name === "AbortError"
}

const pad2 = (n: number): string => n.toString().padStart(2, "0")

// M/D/YYYY
export function formatDate(at: Date): string {
    return `${at.getMonth() + 1}/${at.getDate()}/${at.getFullYear()}`
}

// HH:MM, 24 hour
export function formatTime(at: Date): string {
    return `${pad2(at.getHours())}:${pad2(at.getMinutes())}`
}

// HHMM, as used in file names
export function formatCompactTime(at: Date): string {
    return `${pad2(at.getHours())}${pad2(at.getMinutes())}`
}

/**
 * Milliseconds since the epoch, truncated to the start of the local minute.
 * Two instants fall in the same scheduling slot when their keys are equal.
 */
export function minuteKey(at: Date): number {
    const truncated = new Date(at.getTime())
    truncated.setSeconds(0, 0)
    return truncated.getTime()
}

export function addMinutes(at: Date, minutes: number): Date {
    return new Date(at.getTime() + minutes * 60 * 1000)
}
