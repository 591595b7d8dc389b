import { mkdtempSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { LogRecord } from "../src/utils/logger.js";
import { closeLogFile, log, openLogFile, setLogLevel, setLogSink, setVerbose } from "../src/utils/logger.js";
import { quietConsole } from "./helpers.js";

function readRecords(path: string): LogRecord[] {
  return readFileSync(path, "utf-8")
    .split("\n")
    .filter((line) => line !== "")
    .map((line) => JSON.parse(line));
}

describe("logger", () => {
  let path: string;

  beforeEach(() => {
    quietConsole();
    path = join(mkdtempSync(join(tmpdir(), "installer-log-")), "install_log.jsonl");
  });

  afterEach(() => {
    closeLogFile();
    setLogLevel("info");
    setVerbose(true);
    vi.restoreAllMocks();
  });

  it("writes one JSON record per call with mapped levels", () => {
    openLogFile(path);
    log.info("Starting", { runId: "r1" });
    log.success("Installed git", { task: "git" });
    log.warn("Retrying vlc");
    log.error("Failed vlc", { attempts: 3 });

    const records = readRecords(path);
    expect(records.map((r) => [r.level, r.message])).toEqual([
      ["info", "Starting"],
      ["info", "Installed git"],
      ["warning", "Retrying vlc"],
      ["error", "Failed vlc"],
    ]);
    expect(records[0].runId).toBe("r1");
    expect(records[3].attempts).toBe(3);
    expect(records[0].timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("truncates the file when opened", () => {
    writeFileSync(path, '{"old":true}\n');
    openLogFile(path);
    expect(readFileSync(path, "utf-8")).toBe("");
  });

  it("does not let data override the record fields", () => {
    openLogFile(path);
    log.warn("real message", { message: "spoofed", level: "info" });
    const [record] = readRecords(path);
    expect(record.message).toBe("real message");
    expect(record.level).toBe("warning");
  });

  it("keeps debug lines out of the file", () => {
    setLogLevel("debug");
    openLogFile(path);
    log.debug("noise");
    expect(readRecords(path)).toEqual([]);
    expect(console.debug).toHaveBeenCalledTimes(1);
  });

  it("quiet mode hides info on the console but still records it", () => {
    const records: LogRecord[] = [];
    setLogSink((r) => records.push(r));
    setVerbose(false);

    log.info("hidden");
    log.error("shown");

    expect(console.info).not.toHaveBeenCalled();
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(records.map((r) => r.message)).toEqual(["hidden", "shown"]);
  });

  it("drops records below the current level", () => {
    const records: LogRecord[] = [];
    setLogSink((r) => records.push(r));
    setLogLevel("warn");

    log.info("skip");
    log.warn("keep");

    expect(records.map((r) => r.message)).toEqual(["keep"]);
  });
});
