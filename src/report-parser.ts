import { formatDate, formatTime } from "./clock"
import { extractFields } from "./field-extractor"
import { ExtractedFields, MISSING, MeasurementRecord, REPORT_FIELDS, ReportField } from "./measurement-record"

// Turns the console report of one measurement run into a complete record.
// Fields the report does not provide are set to MISSING; this never throws.
export function parseReport(report: string, at: Date): Readonly<MeasurementRecord> {
    let found: ExtractedFields = {}
    for (const line of report.split(/\r?\n/)) {
        // earlier lines win, like the extractors within a line
        found = { ...extractFields(line), ...found }
    }

    const record: MeasurementRecord = {
        date: formatDate(at),
        time: formatTime(at),
        server: MISSING,
        state: MISSING,
        nodeId: MISSING,
        isp: MISSING,
        latency: MISSING,
        latencyUnit: MISSING,
        jitter: MISSING,
        jitterUnit: MISSING,
        downSpeed: MISSING,
        downSpeedUnit: MISSING,
        downSize: MISSING,
        downSizeUnit: MISSING,
        upSpeed: MISSING,
        upSpeedUnit: MISSING,
        upSize: MISSING,
        upSizeUnit: MISSING,
        packetLoss: MISSING,
        resultUrl: MISSING,
    }
    for (const field of REPORT_FIELDS) {
        const value = found[field]
        if (value) {
            record[field] = value
        }
    }

    return Object.freeze(record)
}

export function missingFields(record: Readonly<MeasurementRecord>): ReportField[] {
    return REPORT_FIELDS.filter(field => record[field] === MISSING)
}
