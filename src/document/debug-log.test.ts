import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DebugLog } from "./debug-log.js";

describe("DebugLog", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "manbook-debug-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("records the run start, each package and each page", () => {
    const filePath = path.join(tempDir, "debug.txt");
    fs.writeFileSync(filePath, "stale contents");
    const log = new DebugLog(filePath);

    log.start(2);
    log.writePackage("bash");
    log.writePage("bash.1", "NAME");

    expect(fs.readFileSync(filePath, "utf-8")).toBe(
      "Starting processing of 2 packages\n" +
        `\n${"=".repeat(50)}\nPackage: bash\n${"=".repeat(50)}\n` +
        `\n${"-".repeat(30)}\nMan page: bash.1\n${"-".repeat(30)}\nNAME\n\n`,
    );
    expect(log.getFilePath()).toBe(filePath);
  });

  it("does nothing without a path", () => {
    const log = new DebugLog(null);

    log.start(1);
    log.writePackage("bash");

    expect(log.getFilePath()).toBeNull();
  });

  it("disables itself after a failed write", () => {
    const filePath = path.join(tempDir, "missing", "debug.txt");
    const log = new DebugLog(filePath);

    log.start(1);
    log.writePackage("bash");

    expect(log.getFilePath()).toBeNull();
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
