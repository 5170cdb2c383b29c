import { promises as fs } from "fs"
import path from "path"
import { stringify } from "csv-stringify/sync"
import { formatCompactTime } from "./clock"
import { hasErrorCode } from "./errors"
import { LOG_COLUMNS, MeasurementRecord } from "./measurement-record"

export const DELIMITER = ", "

export interface LogSink {
    append(record: Readonly<MeasurementRecord>): Promise<void>
}

// <prefix>_<M>.<D>.<YYYY>_<HHMM>.csv
export function logFileName(start: Date, prefix: string): string {
    return `${prefix}_${start.getMonth() + 1}.${start.getDate()}.${start.getFullYear()}_${formatCompactTime(start)}.csv`
}

// Readers that split on a bare comma must still see 20 fields, so any value
// holding a comma is quoted too, not just ones holding the full delimiter.
function formatRow(values: string[]): string {
    return stringify([values], { delimiter: DELIMITER, record_delimiter: "unix", quoted_match: "," })
}

export const HEADER_ROW = formatRow(LOG_COLUMNS.map(([header]) => header))

export function formatRecord(record: Readonly<MeasurementRecord>): string {
    return formatRow(LOG_COLUMNS.map(([, field]) => record[field]))
}

/**
 * Append-only CSV log. The header is written once, when the file is created;
 * after that rows are only ever appended.
 */
export class CsvLogWriter implements LogSink {
    readonly path: string

    constructor(directory: string, fileName: string) {
        this.path = path.join(directory, fileName)
    }

    // Returns true when the file was created by this call.
    async open(): Promise<boolean> {
        try {
            await fs.writeFile(this.path, HEADER_ROW, { encoding: "utf-8", flag: "wx" })
            return true
        } catch (e) {
            if (hasErrorCode(e, "EEXIST")) {
                return false
            }
            throw e
        }
    }

    async append(record: Readonly<MeasurementRecord>): Promise<void> {
        await fs.appendFile(this.path, formatRecord(record), "utf-8")
    }
}
