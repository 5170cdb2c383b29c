// Fatal conditions. Anything thrown with one of these classes stops the monitor
// before (or instead of) the next tick.

export class ConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options)
        this.name = "ConfigError"
    }
}

export class MeasurementLaunchError extends Error {
    readonly command: string

    constructor(command: string, options?: { cause?: unknown }) {
        super(`Could not start measurement tool "${command}"`, options)
        this.name = "MeasurementLaunchError"
        this.command = command
    }
}

export interface ExecException extends Error {
    cmd?: string | undefined;
    killed?: boolean | undefined;
    code?: number | string | undefined;
    signal?: NodeJS.Signals | undefined;
    stdout?: string;
    stderr?: string;
}

export function isExecException(candidate: unknown): candidate is ExecException {
    if (candidate instanceof Error && ('code' in candidate || 'cmd' in candidate)) {
        return true;
    }
    return false;
}

export function hasErrorCode(candidate: unknown, ...codes: string[]): boolean {
    return candidate instanceof Error && 'code' in candidate && typeof candidate.code === 'string' && codes.includes(candidate.code)
}

// Errors meaning the executable itself could not be run, as opposed to a run that failed.
export function isSpawnFailure(candidate: unknown): boolean {
    return hasErrorCode(candidate, "ENOENT", "EACCES")
}
