import { promises as fs } from 'fs';
import path from 'path';
import { ChildProcess, execFile } from 'child_process';
import { once } from 'events';
import util from 'util';
import { MeasurementLaunchError, isExecException, isSpawnFailure } from './errors';

const execFileAsync = util.promisify(execFile);

// Reports are a few kilobytes; anything close to this is not a report.
const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;
const PROBE_TIMEOUT_SECS = 15;
// How long an aborted child gets to exit after SIGTERM before it is sent SIGKILL.
export const KILL_GRACE_MS = 2000;

export type ExecFileOpts = {
    signal: AbortSignal
    maxBuffer: number
    windowsHide: boolean
}

export type ExecFile = (file: string, args: readonly string[], opts: ExecFileOpts) => Promise<{ stdout: string, stderr: string }>

export const defaultExecFile: ExecFile = async (file, args, opts) => {
    const pending = execFileAsync(file, args, { ...opts, encoding: 'utf8' });
    try {
        return await pending;
    } catch (e) {
        // The abort rejects as soon as SIGTERM is sent; wait for the child to be gone
        if (opts.signal.aborted) {
            await reap(pending.child);
        }
        throw e;
    }
};

async function reap(child: ChildProcess): Promise<void> {
    if (child.pid === undefined || child.exitCode !== null || child.signalCode !== null) {
        return;
    }
    const exited = once(child, 'exit');
    const escalate = setTimeout(() => child.kill('SIGKILL'), KILL_GRACE_MS);
    try {
        await exited;
    } finally {
        clearTimeout(escalate);
    }
}

export type MeasurementOutcome =
    | { status: 'completed', output: string, exitCode: number, durationMs: number }
    | { status: 'timed-out', output: string, durationMs: number }
    | { status: 'cancelled', durationMs: number }

export interface Measurer {
    run(stop?: AbortSignal): Promise<MeasurementOutcome>
}

export type RunnerOpts = {
    command: string
    args: string[]
    timeoutSecs: number
    execFile?: ExecFile
}

/**
 * Runs the measurement tool once per call, never more than one child at a time
 * from the caller's point of view since `run` only resolves after the child is
 * gone. The child is killed when the deadline passes or `stop` fires.
 *
 * The captured output only lives for the duration of one `run` call.
 */
export class MeasurementRunner implements Measurer {
    readonly command: string
    readonly args: string[]
    readonly timeoutSecs: number
    private readonly execFile: ExecFile

    constructor(opts: RunnerOpts) {
        this.command = opts.command
        this.args = opts.args
        this.timeoutSecs = opts.timeoutSecs
        this.execFile = opts.execFile ?? defaultExecFile
    }

    async run(stop?: AbortSignal): Promise<MeasurementOutcome> {
        const deadline = AbortSignal.timeout(this.timeoutSecs * 1000)
        const signal = stop === undefined ? deadline : AbortSignal.any([stop, deadline])
        const start = Date.now()

        try {
            const { stdout, stderr } = await this.execFile(this.command, this.args, {
                signal,
                maxBuffer: MAX_OUTPUT_BYTES,
                windowsHide: true,
            })
            return { status: 'completed', output: combineOutput(stdout, stderr), exitCode: 0, durationMs: Date.now() - start }
        } catch (e: unknown) {
            const durationMs = Date.now() - start
            if (stop?.aborted) {
                return { status: 'cancelled', durationMs }
            }
            if (deadline.aborted) {
                const partial = isExecException(e) ? combineOutput(e.stdout, e.stderr) : ''
                return { status: 'timed-out', output: partial, durationMs }
            }
            if (isSpawnFailure(e)) {
                throw new MeasurementLaunchError(this.command, { cause: e })
            }
            // The tool ran and exited non-zero: its text may still carry some fields.
            if (isExecException(e) && typeof e.code === 'number') {
                return { status: 'completed', output: combineOutput(e.stdout, e.stderr), exitCode: e.code, durationMs }
            }
            throw e
        }
    }

    /**
     * Start-up check that the executable can be spawned at all. Returns the
     * first line the tool printed. A tool that runs but fails the probe is not
     * fatal here; the first tick will show what is wrong with it.
     */
    async probe(probeArgs: string[]): Promise<string> {
        try {
            const { stdout, stderr } = await this.execFile(this.command, probeArgs, {
                signal: AbortSignal.timeout(PROBE_TIMEOUT_SECS * 1000),
                maxBuffer: MAX_OUTPUT_BYTES,
                windowsHide: true,
            })
            return firstLine(combineOutput(stdout, stderr)) ?? 'unknown version'
        } catch (e: unknown) {
            if (isSpawnFailure(e)) {
                throw new MeasurementLaunchError(this.command, { cause: e })
            }
            console.warn(`Warning: "${this.command} ${probeArgs.join(' ')}" failed`, e)
            return 'unknown version'
        }
    }
}

export function combineOutput(stdout: string | undefined, stderr: string | undefined): string {
    return [stdout, stderr].filter((part): part is string => part !== undefined && part.length > 0).join('\n')
}

function firstLine(text: string): string | undefined {
    return text.split('\n').map(line => line.trim()).find(line => line.length > 0)
}

export async function saveReport(directory: string, at: Date, outcome: MeasurementOutcome): Promise<void> {
    try {
        await fs.mkdir(directory, { recursive: true })

        const stamp = at.toISOString().replace(/[:.]/g, '-')
        const logFile = path.join(directory, `${stamp}.log`)
        const output = outcome.status === 'cancelled' ? '' : outcome.output
        const exitCode = outcome.status === 'completed' ? ` (exit code ${outcome.exitCode})` : ''
        const logContent = `=== Measurement: ${at.toISOString()} ===\n=== Outcome: ${outcome.status}${exitCode} after ${outcome.durationMs}ms ===\n\n${output}\n`

        await fs.writeFile(logFile, logContent, 'utf-8')
    } catch (e) {
        // Losing a saved report must not stop the monitor
        console.warn('Warning: Failed to save measurement report', e)
    }
}
