import fs from "fs";
import os from "os";
import path from "path";
import { ConfigOverrides, prepareLogDirectory, readConfigFile, resolveConfig } from "./config";
import { ConfigError } from "./errors";

describe("resolveConfig", () => {
  it("falls back to the defaults", () => {
    expect(resolveConfig({}, {}, "/srv/speedlog")).toEqual({
      interval: 15,
      timeout: 100,
      logDir: "/srv/speedlog",
      tool: "ookla",
      saveReports: "none",
    });
  });

  it("lets overrides win over the config file", () => {
    const config = resolveConfig({ interval: 30, timeout: 60 }, { interval: 5, timeout: undefined }, "/srv");

    expect(config.interval).toEqual(5);
    expect(config.timeout).toEqual(60);
  });

  it("accepts numbers given as text, as environment variables are", () => {
    expect(resolveConfig({}, { interval: "30" }, "/srv").interval).toEqual(30);
  });

  it("resolves a relative log directory", () => {
    expect(resolveConfig({}, { logDir: "logs" }, "/srv/base").logDir).toEqual("/srv/base/logs");
  });

  const invalid: Array<[ConfigOverrides, string]> = [
    [{ interval: 0 }, "Invalid configuration: interval must be at least 1 minute"],
    [{ timeout: -5 }, "Invalid configuration: timeout must be at least 1 second"],
    [{ interval: 2.5 }, "Invalid configuration: interval must be a whole number of minutes"],
    [{ interval: "abc" }, "Invalid configuration: interval must be a number of minutes"],
    [{ tool: "iperf" }, "Invalid configuration: tool must be one of: ookla"],
  ];

  it.each(invalid)("rejects %p", (overrides, message) => {
    expect(() => resolveConfig({}, overrides, "/srv")).toThrow(ConfigError);
    expect(() => resolveConfig({}, overrides, "/srv")).toThrow(message);
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "speedlog-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const write = (contents: string): string => {
    const file = path.join(dir, "speedlog.yaml");
    fs.writeFileSync(file, contents);
    return file;
  };

  it("reads the options it contains", async () => {
    const file = write("interval: 30\nlogDir: /var/log/speedlog\nsaveReports: failures\n");

    expect(await readConfigFile(file)).toEqual({
      interval: 30,
      logDir: "/var/log/speedlog",
      saveReports: "failures",
    });
  });

  it("treats an empty file as no options", async () => {
    expect(await readConfigFile(write(""))).toEqual({});
  });

  it("rejects unknown keys", async () => {
    await expect(readConfigFile(write("colour: blue\n"))).rejects.toThrow(/Unrecognized key/);
  });

  it("rejects malformed YAML", async () => {
    await expect(readConfigFile(write("interval: [1\n"))).rejects.toThrow("is not valid YAML");
  });

  it("rejects a missing file", async () => {
    await expect(readConfigFile(path.join(dir, "nope.yaml"))).rejects.toBeInstanceOf(ConfigError);
  });

  it("creates a missing log directory", async () => {
    const logDir = path.join(dir, "a", "b");

    await prepareLogDirectory(logDir);

    expect(fs.statSync(logDir).isDirectory()).toBe(true);
  });

  it("rejects a log directory that is a file", async () => {
    const file = write("");

    await expect(prepareLogDirectory(file)).rejects.toThrow(`Log directory ${file} is not writable`);
  });
});
