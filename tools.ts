// Measurement utilities the monitor knows how to drive. The monitor only needs
// an executable that prints the report described in src/field-extractor.ts;
// how it got installed is not its concern.

export type MeasurementTool = {
    id: string,
    // Looked up on PATH unless overridden with --command
    command: string,
    args: string[],
    // Cheap invocation used at start-up to check that the executable runs
    probeArgs: string[],
    // Log files are named <logPrefix>_<M>.<D>.<YYYY>_<HHMM>.csv
    logPrefix: string,
}

export const tools: Array<MeasurementTool> = [
    {
        id: "ookla",
        command: "speedtest",
        args: ["--accept-license", "--accept-gdpr"],
        probeArgs: ["--version"],
        logPrefix: "Ookla",
    },
]

export function findTool(id: string): MeasurementTool | undefined {
    return tools.find(tool => tool.id === id)
}
