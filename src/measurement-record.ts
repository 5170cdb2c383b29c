// Value written in place of any field that could not be read from the report.
export const MISSING = "ERROR"

/**
 * One CSV row. Every value is kept as the text the measurement tool printed,
 * so units and precision are logged verbatim.
 */
export interface MeasurementRecord {
    date: string
    time: string
    server: string
    state: string
    nodeId: string
    isp: string
    latency: string
    latencyUnit: string
    jitter: string
    jitterUnit: string
    downSpeed: string
    downSpeedUnit: string
    downSize: string
    downSizeUnit: string
    upSpeed: string
    upSpeedUnit: string
    upSize: string
    upSizeUnit: string
    packetLoss: string
    resultUrl: string
}

// Fields that come from the report text, as opposed to the tick's own clock.
export type ReportField = Exclude<keyof MeasurementRecord, "date" | "time">

export type ExtractedFields = Partial<Record<ReportField, string>>

// Column order of the log file.
export const LOG_COLUMNS: ReadonlyArray<readonly [header: string, field: keyof MeasurementRecord]> = [
    ["Date", "date"],
    ["Time", "time"],
    ["Server", "server"],
    ["State", "state"],
    ["NodeID", "nodeId"],
    ["ISP", "isp"],
    ["Latency", "latency"],
    ["LatencyUnit", "latencyUnit"],
    ["Jitter", "jitter"],
    ["JitterUnit", "jitterUnit"],
    ["DownSpeed", "downSpeed"],
    ["DownSpeedUnit", "downSpeedUnit"],
    ["DownSize", "downSize"],
    ["DownSizeUnit", "downSizeUnit"],
    ["UpSpeed", "upSpeed"],
    ["UpSpeedUnit", "upSpeedUnit"],
    ["UpSize", "upSize"],
    ["UpSizeUnit", "upSizeUnit"],
    ["PacketLoss", "packetLoss"],
    ["ResultURL", "resultUrl"],
]

export const REPORT_FIELDS: readonly ReportField[] = [
    "server",
    "state",
    "nodeId",
    "isp",
    "latency",
    "latencyUnit",
    "jitter",
    "jitterUnit",
    "downSpeed",
    "downSpeedUnit",
    "downSize",
    "downSizeUnit",
    "upSpeed",
    "upSpeedUnit",
    "upSize",
    "upSizeUnit",
    "packetLoss",
    "resultUrl",
]
