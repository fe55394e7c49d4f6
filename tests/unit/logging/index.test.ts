/**
 * Unit tests for logger construction and log helpers.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { createLogger, logError, logStage } from "../../../src/logging";
import { UsageError } from "../../../src/errors";

describe("createLogger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "logging-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("applies the configured level", () => {
    expect(createLogger({ level: "error", pretty: false }).level).toBe("error");
  });

  it("appends JSON lines to LOG_FILE, creating its directory", () => {
    const file = path.join(dir, "nested", "run.log");
    const log = createLogger({ level: "info", pretty: false, file });

    logStage(log, "OUTPUT_WRITTEN", { bytes: 48044 });
    logError(log, new UsageError("Expected 3 arguments, got 1"), { inputPath: "in.wav" });

    const lines = fs.readFileSync(file, "utf8").trim().split("\n").map((l) => JSON.parse(l));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({ level: 30, event: "OUTPUT_WRITTEN", bytes: 48044, msg: "output written" });
    expect(lines[1]).toMatchObject({
      level: 50,
      err: "Expected 3 arguments, got 1",
      code: "USAGE",
      inputPath: "in.wav",
      msg: "Error",
    });
    expect(typeof lines[0].time).toBe("string");
  });
});
