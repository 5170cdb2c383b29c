import fs from "fs";
import os from "os";
import path from "path";
import * as csv from "csv-parse/sync";
import { CsvLogWriter, HEADER_ROW, formatRecord, logFileName } from "./log-writer";
import { MeasurementRecord } from "./measurement-record";

const record = (overrides: Partial<MeasurementRecord> = {}): MeasurementRecord => ({
  date: "3/5/2024",
  time: "09:07",
  server: "Acme Net",
  state: "California",
  nodeId: "4821",
  isp: "Example Broadband",
  latency: "12.3",
  latencyUnit: "ms",
  jitter: "1.1",
  jitterUnit: "ms",
  downSpeed: "95.4",
  downSpeedUnit: "Mbps",
  downSize: "120.5",
  downSizeUnit: "MB",
  upSpeed: "20.1",
  upSpeedUnit: "Mbps",
  upSize: "25.0",
  upSizeUnit: "MB",
  packetLoss: "0.0%",
  resultUrl: "https://www.speedtest.net/result/c/00000000-test",
  ...overrides,
});

const load = (file: string): string[][] =>
  csv.parse(fs.readFileSync(file, "utf8"), {
    delimiter: ", ",
    skip_empty_lines: true,
  });

const lines = (file: string): string[] =>
  fs.readFileSync(file, "utf8").split("\n").filter((line) => line.length > 0);

describe("log file name", () => {
  it("uses the start date and a zero padded 24 hour time", () => {
    expect(logFileName(new Date(2024, 2, 5, 9, 7), "Ookla")).toEqual("Ookla_3.5.2024_0907.csv");
    expect(logFileName(new Date(2024, 11, 31, 23, 59), "Ookla")).toEqual("Ookla_12.31.2024_2359.csv");
  });
});

describe("row formatting", () => {
  it("writes the fixed header", () => {
    expect(HEADER_ROW).toEqual(
      "Date, Time, Server, State, NodeID, ISP, Latency, LatencyUnit, Jitter, JitterUnit, DownSpeed, DownSpeedUnit, DownSize, DownSizeUnit, UpSpeed, UpSpeedUnit, UpSize, UpSizeUnit, PacketLoss, ResultURL\n"
    );
  });

  it("writes the fields in column order", () => {
    expect(formatRecord(record())).toEqual(
      "3/5/2024, 09:07, Acme Net, California, 4821, Example Broadband, 12.3, ms, 1.1, ms, 95.4, Mbps, 120.5, MB, 20.1, Mbps, 25.0, MB, 0.0%, https://www.speedtest.net/result/c/00000000-test\n"
    );
  });

  it("quotes a value containing the delimiter", () => {
    expect(formatRecord(record({ isp: "Example, Inc" }))).toContain(', "Example, Inc", ');
  });

  it("quotes a value containing a bare comma", () => {
    const line = formatRecord(record({ isp: "Foo,Bar", resultUrl: "https://x/a,b" }));

    expect(line).toContain(', "Foo,Bar", ');
    expect(line.endsWith(', "https://x/a,b"\n')).toBe(true);

    const [row]: string[][] = csv.parse(line, { delimiter: ",", ltrim: true });
    expect(row).toHaveLength(20);
    expect(row[5]).toEqual("Foo,Bar");
    expect(row[19]).toEqual("https://x/a,b");
  });
});

describe("CsvLogWriter", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "speedlog-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes one header and one line per record", async () => {
    const writer = new CsvLogWriter(dir, "log.csv");

    expect(await writer.open()).toBe(true);
    for (const time of ["09:00", "09:15", "09:30"]) {
      await writer.append(record({ time }));
    }

    const rows = load(writer.path);
    expect(lines(writer.path)).toHaveLength(4);
    expect(rows).toHaveLength(4);
    expect(rows.every((row) => row.length === 20)).toBe(true);
    expect(rows.slice(1).map((row) => row[1])).toEqual(["09:00", "09:15", "09:30"]);
  });

  it("appends to an existing file without touching earlier lines", async () => {
    const first = new CsvLogWriter(dir, "log.csv");
    await first.open();
    await first.append(record({ time: "09:00" }));
    await first.append(record({ time: "09:15" }));
    const before = fs.readFileSync(first.path, "utf8");

    const reopened = new CsvLogWriter(dir, "log.csv");
    expect(await reopened.open()).toBe(false);
    await reopened.append(record({ time: "09:30" }));
    await reopened.append(record({ time: "09:45" }));
    await reopened.append(record({ time: "10:00" }));

    const after = fs.readFileSync(reopened.path, "utf8");
    expect(after.startsWith(before)).toBe(true);
    expect(lines(reopened.path)).toHaveLength(6);
  });

  it("keeps twenty fields when a value needs quoting", async () => {
    const writer = new CsvLogWriter(dir, "log.csv");
    await writer.open();
    await writer.append(record({ isp: "Example, Inc" }));

    const [, row] = load(writer.path);
    expect(row).toHaveLength(20);
    expect(row[5]).toEqual("Example, Inc");
  });

  it("fails when the directory is gone", async () => {
    const writer = new CsvLogWriter(path.join(dir, "missing"), "log.csv");

    await expect(writer.append(record())).rejects.toThrow(/ENOENT/);
  });
});
