import path from "path"
import { Clock, Sleep, addMinutes, formatTime, minuteKey, sleep as defaultSleep, systemClock } from "./clock"
import { LogSink } from "./log-writer"
import { MeasurementOutcome, Measurer, saveReport } from "./measurement-runner"
import { missingFields, parseReport } from "./report-parser"

export const SAVE_REPORTS = ["none", "failures", "all"] as const
export type SaveReports = typeof SAVE_REPORTS[number]

const IDLE_MS = 1000

export interface ScheduleState {
    nextDueTime: Date
    // minutes
    readonly interval: number
    // seconds
    readonly timeoutBound: number
    readonly logDirectory: string
    readonly logFileName: string
}

export type SchedulerOpts = {
    state: ScheduleState
    runner: Measurer
    log: LogSink
    saveReports?: SaveReports
    clock?: Clock
    sleep?: Sleep
}

export function createScheduleState(
    opts: { interval: number, timeoutBound: number, logDirectory: string, logFileName: string },
    start: Date
): ScheduleState {
    return { ...opts, nextDueTime: start }
}

// Due times are compared at minute resolution.
export function isDue(now: Date, state: ScheduleState): boolean {
    return minuteKey(now) === minuteKey(state.nextDueTime)
}

/**
 * Moves `nextDueTime` forward by whole intervals while it lies in a minute that
 * has already passed. That only happens when a tick ran past the next due
 * minute (a timeout longer than the interval); the grid stays anchored at the
 * first tick. Returns the number of slots skipped.
 */
export function skipMissedSlots(now: Date, state: ScheduleState): number {
    let skipped = 0
    while (minuteKey(state.nextDueTime) < minuteKey(now)) {
        state.nextDueTime = addMinutes(state.nextDueTime, state.interval)
        skipped++
    }
    return skipped
}

/**
 * Runs measurements every `state.interval` minutes, the first one right away,
 * until `signal` is aborted. Ticks never overlap: the loop waits for each
 * measurement to complete or time out before looking at the clock again.
 *
 * Launch failures and log write failures are not caught here and end the loop.
 */
export async function runScheduler(opts: SchedulerOpts, signal?: AbortSignal): Promise<void> {
    const clock = opts.clock ?? systemClock
    const sleep = opts.sleep ?? defaultSleep
    const { state } = opts

    state.nextDueTime = clock.now()

    while (!signal?.aborted) {
        const now = clock.now()

        const skipped = skipMissedSlots(now, state)
        if (skipped > 0) {
            console.warn(`Missed ${skipped} scheduled measurement(s), next one at ${formatTime(state.nextDueTime)}`)
        }

        if (isDue(now, state)) {
            // Advance first so a slow tick cannot fire twice for the same minute
            state.nextDueTime = addMinutes(state.nextDueTime, state.interval)
            await runTick(opts, now, signal)
        }

        await sleep(IDLE_MS, signal)
    }
}

async function runTick(opts: SchedulerOpts, at: Date, signal?: AbortSignal): Promise<void> {
    const { state } = opts
    console.log(`= Measurement at ${formatTime(at)}, next at ${formatTime(state.nextDueTime)}`)

    const outcome = await opts.runner.run(signal)

    switch (outcome.status) {
        case "cancelled":
            return
        case "timed-out":
            console.warn(`Warning: measurement did not finish within ${state.timeoutBound}s, nothing logged for ${formatTime(at)}`)
            await archive(opts, at, outcome, true)
            return
        case "completed": {
            if (outcome.exitCode !== 0) {
                console.warn(`Warning: measurement tool exited with code ${outcome.exitCode}`)
            }
            const record = parseReport(outcome.output, at)
            const missing = missingFields(record)
            if (missing.length > 0) {
                console.warn(`Warning: report did not include ${missing.join(", ")}`)
            }

            await opts.log.append(record)
            console.log(`== Logged: down ${record.downSpeed} ${record.downSpeedUnit}, up ${record.upSpeed} ${record.upSpeedUnit}, latency ${record.latency} ${record.latencyUnit}`)

            await archive(opts, at, outcome, outcome.exitCode !== 0 || missing.length > 0)
            return
        }
    }
}

async function archive(opts: SchedulerOpts, at: Date, outcome: MeasurementOutcome, failed: boolean): Promise<void> {
    const mode = opts.saveReports ?? "none"
    if (mode === "all" || (mode === "failures" && failed)) {
        await saveReport(path.join(opts.state.logDirectory, "reports"), at, outcome)
    }
}
