import { constants, promises as fs } from "fs"
import path from "path"
import { parse as parseYAML } from "yaml"
import { z } from "zod"
import { findTool, tools } from "../tools"
import { ConfigError } from "./errors"
import { SAVE_REPORTS } from "./scheduler"

export const DEFAULT_INTERVAL_MINUTES = 15
export const DEFAULT_TIMEOUT_SECS = 100

const positiveInt = (unit: string) => z.coerce.number({ invalid_type_error: `must be a number of ${unit}` })
    .int({ message: `must be a whole number of ${unit}` })
    .positive({ message: `must be at least 1 ${unit.replace(/s$/, "")}` })

export const configSchema = z.object({
    interval: positiveInt("minutes"),
    timeout: positiveInt("seconds"),
    logDir: z.string().min(1),
    tool: z.string().refine(id => findTool(id) !== undefined, {
        message: `must be one of: ${tools.map(tool => tool.id).join(", ")}`,
    }),
    command: z.string().min(1).optional(),
    saveReports: z.enum(SAVE_REPORTS),
}).strict()

export type MonitorConfig = z.infer<typeof configSchema>

// Everything a config file may set; all of it optional.
const fileSchema = configSchema.partial()

export type ConfigOverrides = { [K in keyof MonitorConfig]?: unknown }

function describeIssues(error: z.ZodError, source: string): string {
    const issues = error.issues.map(issue => `${issue.path.join(".") || "(root)"} ${issue.message}`)
    return `Invalid ${source}: ${issues.join("; ")}`
}

/**
 * Reads a YAML config file. Keys are the camel-cased option names, e.g.
 *
 *   interval: 30
 *   timeout: 120
 *   logDir: /var/log/speedlog
 */
export async function readConfigFile(file: string): Promise<Partial<MonitorConfig>> {
    let contents: string
    try {
        contents = await fs.readFile(file, "utf-8")
    } catch (e) {
        throw new ConfigError(`Could not read config file ${file}`, { cause: e })
    }

    let parsed: unknown
    try {
        parsed = parseYAML(contents)
    } catch (e) {
        throw new ConfigError(`Config file ${file} is not valid YAML`, { cause: e })
    }

    const result = fileSchema.safeParse(parsed ?? {})
    if (!result.success) {
        throw new ConfigError(describeIssues(result.error, `config file ${file}`))
    }
    return result.data
}

/**
 * Defaults, then the config file, then `overrides` (environment and command
 * line, as collected by yargs). Undefined overrides are ignored.
 */
export function resolveConfig(file: Partial<MonitorConfig>, overrides: ConfigOverrides, cwd: string = process.cwd()): MonitorConfig {
    const merged: Record<string, unknown> = {
        interval: DEFAULT_INTERVAL_MINUTES,
        timeout: DEFAULT_TIMEOUT_SECS,
        logDir: cwd,
        tool: "ookla",
        saveReports: "none",
    }
    for (const source of [file, overrides]) {
        const entries: Array<[string, unknown]> = Object.entries(source)
        for (const [key, value] of entries) {
            if (value !== undefined) {
                merged[key] = value
            }
        }
    }

    const result = configSchema.safeParse(merged)
    if (!result.success) {
        throw new ConfigError(describeIssues(result.error, "configuration"))
    }
    return { ...result.data, logDir: path.resolve(cwd, result.data.logDir) }
}

// Creates the log directory when needed and checks that rows can be written to it.
export async function prepareLogDirectory(dir: string): Promise<void> {
    try {
        await fs.mkdir(dir, { recursive: true })
        await fs.access(dir, constants.W_OK)
    } catch (e) {
        throw new ConfigError(`Log directory ${dir} is not writable`, { cause: e })
    }
}
