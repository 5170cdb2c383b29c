#!/usr/bin/env node
import process from "process"
import yargs from "yargs/yargs"
import { findTool, tools } from "./tools"
import { displaySettingsBanner } from "./src/banner"
import { prepareLogDirectory, readConfigFile, resolveConfig } from "./src/config"
import { ConfigError, MeasurementLaunchError } from "./src/errors"
import { CsvLogWriter, logFileName } from "./src/log-writer"
import { MeasurementRunner } from "./src/measurement-runner"
import { SAVE_REPORTS, createScheduleState, runScheduler } from "./src/scheduler"

export async function main(args: string[], stop: AbortSignal): Promise<void> {
    const argv = await yargs(args)
        .scriptName("speedlog")
        .usage("$0 [options]\n\nRuns a speed test every --interval minutes and appends the results to a CSV file.")
        .env("SPEEDLOG")
        .options({
            'interval': {
                alias: 'i',
                description: 'Minutes between measurements (default: 15)',
                type: 'number'
            },
            'timeout': {
                alias: 't',
                description: 'Seconds to wait for one measurement before giving up on it (default: 100)',
                type: 'number'
            },
            'log-dir': {
                alias: 'd',
                description: 'Directory for the CSV log (default: current directory)',
                type: 'string'
            },
            'config': {
                alias: 'c',
                description: 'YAML file with any of interval, timeout, logDir, tool, command, saveReports',
                type: 'string'
            },
            'tool': {
                description: 'Measurement tool to run (default: ookla)',
                choices: tools.map(tool => tool.id),
                type: 'string'
            },
            'command': {
                description: 'Path of the measurement executable, if it is not on PATH',
                type: 'string'
            },
            'save-reports': {
                description: 'Keep the raw tool output of failed or all measurements under <log-dir>/reports (default: none)',
                choices: SAVE_REPORTS,
                type: 'string'
            },
        })
        .strict()
        .help()
        .version(false)
        .alias('help', 'h').argv

    const file = argv.config ? await readConfigFile(argv.config) : {}
    const config = resolveConfig(file, {
        interval: argv.interval,
        timeout: argv.timeout,
        logDir: argv.logDir,
        tool: argv.tool,
        command: argv.command,
        saveReports: argv.saveReports,
    })

    const tool = findTool(config.tool)
    if (tool === undefined) {
        throw new ConfigError(`Unknown measurement tool ${config.tool}`)
    }

    await prepareLogDirectory(config.logDir)

    const runner = new MeasurementRunner({
        command: config.command ?? tool.command,
        args: tool.args,
        timeoutSecs: config.timeout,
    })
    const version = await runner.probe(tool.probeArgs)

    const start = new Date()
    const state = createScheduleState({
        interval: config.interval,
        timeoutBound: config.timeout,
        logDirectory: config.logDir,
        logFileName: logFileName(start, tool.logPrefix),
    }, start)

    const writer = new CsvLogWriter(state.logDirectory, state.logFileName)
    const created = await writer.open()

    displaySettingsBanner("SPEEDLOG", [
        ["Tool", `${runner.command} (${version})`],
        ["Interval", `${state.interval} min`],
        ["Timeout", `${state.timeoutBound} s`],
        ["Log file", `${writer.path}${created ? "" : " (appending)"}`],
        ["Reports", config.saveReports],
    ])

    await runScheduler({ state, runner, log: writer, saveReports: config.saveReports }, stop)

    console.log("Monitoring stopped")
}

if (require.main === module) {
    const controller = new AbortController()
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            console.log(`Received ${signal}, stopping after the current step`)
            controller.abort()
        })
    }

    main(process.argv.slice(2), controller.signal)
        .then(() => process.exit(0))
        .catch((err) => {
            if (err instanceof ConfigError) {
                console.error(`Configuration error: ${err.message}`)
            } else if (err instanceof MeasurementLaunchError) {
                console.error(`${err.message}. Is it installed and on PATH?`, err.cause)
            } else {
                console.error(err)
            }
            process.exit(1)
        })
}
