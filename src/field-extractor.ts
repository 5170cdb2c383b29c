import { ExtractedFields, REPORT_FIELDS, ReportField } from "./measurement-record"

// Helpers for reading single lines of the measurement tool's console report.
// None of these throw: a line that does not have the expected shape just
// yields fewer fields.

export type Extract = (line: string) => ExtractedFields | undefined

// Text following the first case-insensitive occurrence of `marker`, or
// undefined when the line does not carry the marker at all.
export function afterMarker(line: string, marker: string): string | undefined {
    const at = line.toLowerCase().indexOf(marker.toLowerCase())
    if (at === -1) {
        return undefined
    }
    return line.slice(at + marker.length).trim()
}

// "95.4 Mbps" => ["95.4", "Mbps"]. Needs at least one whitespace between the two.
export function splitValueUnit(text: string | undefined): [value: string, unit: string] | undefined {
    if (text === undefined) {
        return undefined
    }
    const match = /^(\S+)\s+(.+)$/.exec(text.trim())
    if (match === null) {
        return undefined
    }
    return [match[1], match[2].trim()]
}

// "12.3 ms (jitter: 1.1 ms)" => { head: "12.3 ms ", inner: "jitter: 1.1 ms" }
export function splitParenthesized(text: string): { head: string, inner?: string } {
    const open = text.indexOf("(")
    if (open === -1) {
        return { head: text }
    }
    const close = text.indexOf(")", open)
    const inner = close === -1 ? text.slice(open + 1) : text.slice(open + 1, close)
    return { head: text.slice(0, open), inner }
}

// Drops undefined and blank entries so that callers can merge results with a spread.
function present(fields: Partial<Record<ReportField, string | undefined>>): ExtractedFields {
    const out: ExtractedFields = {}
    for (const field of REPORT_FIELDS) {
        const trimmed = fields[field]?.trim()
        if (trimmed) {
            out[field] = trimmed
        }
    }
    return out
}

// Server: <name>, <state> (id = <id>)
export const extractServer: Extract = (line) => {
    const rest = afterMarker(line, "Server:")
    if (rest === undefined) {
        return undefined
    }
    const { head, inner } = splitParenthesized(rest)
    const comma = head.indexOf(",")
    return present({
        server: comma === -1 ? head : head.slice(0, comma),
        state: comma === -1 ? undefined : head.slice(comma + 1),
        nodeId: inner?.replace(/id\s*[=:]\s*/i, ""),
    })
}

// ISP: <name>
export const extractIsp: Extract = (line) => {
    const rest = afterMarker(line, "ISP:")
    if (rest === undefined) {
        return undefined
    }
    return present({ isp: rest })
}

// Latency: <value> <unit> (jitter: <value> <unit>)
export const extractLatency: Extract = (line) => {
    const rest = afterMarker(line, "Latency:")
    if (rest === undefined) {
        return undefined
    }
    const { head, inner } = splitParenthesized(rest)
    const latency = splitValueUnit(head)
    const jitter = splitValueUnit(inner?.replace(/jitter:?/i, ""))
    return present({
        latency: latency?.[0],
        latencyUnit: latency?.[1],
        jitter: jitter?.[0],
        jitterUnit: jitter?.[1],
    })
}

function transfer(line: string, marker: string): { speed?: [string, string], size?: [string, string] } | undefined {
    const rest = afterMarker(line, marker)
    if (rest === undefined) {
        return undefined
    }
    const { head, inner } = splitParenthesized(rest)
    return {
        speed: splitValueUnit(head),
        size: splitValueUnit(inner?.replace(/data used:?/i, "")),
    }
}

// Download: <value> <unit> (data used: <value> <unit>)
export const extractDownload: Extract = (line) => {
    const result = transfer(line, "Download:")
    if (result === undefined) {
        return undefined
    }
    return present({
        downSpeed: result.speed?.[0],
        downSpeedUnit: result.speed?.[1],
        downSize: result.size?.[0],
        downSizeUnit: result.size?.[1],
    })
}

// Upload: <value> <unit> (data used: <value> <unit>)
export const extractUpload: Extract = (line) => {
    const result = transfer(line, "Upload:")
    if (result === undefined) {
        return undefined
    }
    return present({
        upSpeed: result.speed?.[0],
        upSpeedUnit: result.speed?.[1],
        upSize: result.size?.[0],
        upSizeUnit: result.size?.[1],
    })
}

// Packet Loss: <value>
export const extractPacketLoss: Extract = (line) => {
    const rest = afterMarker(line, "Packet Loss:")
    if (rest === undefined) {
        return undefined
    }
    return present({ packetLoss: rest })
}

// Result URL: <url>
export const extractResultUrl: Extract = (line) => {
    const rest = afterMarker(line, "URL:")
    if (rest === undefined) {
        return undefined
    }
    return present({ resultUrl: rest })
}

export const FIELD_EXTRACTORS: readonly Extract[] = [
    extractServer,
    extractIsp,
    extractLatency,
    extractDownload,
    extractUpload,
    extractPacketLoss,
    extractResultUrl,
]

/**
 * Runs every extractor over the line and merges what they found. A line is not
 * assumed to carry a single marker; when two extractors produce the same field
 * the one listed first wins.
 */
export function extractFields(line: string, extractors: readonly Extract[] = FIELD_EXTRACTORS): ExtractedFields {
    let fields: ExtractedFields = {}
    for (const extract of extractors) {
        const found = extract(line)
        if (found !== undefined) {
            fields = { ...found, ...fields }
        }
    }
    return fields
}
