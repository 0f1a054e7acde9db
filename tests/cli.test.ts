import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { EXIT, MOCK_PRICES_FILE, createRuntime, parseCommand, runCommand } from "../src/cli.js";
import { loadConfig } from "../src/config/index.js";
import { position } from "./helpers.js";

describe("parseCommand", () => {
  it("should accept the known commands only", () => {
    expect(parseCommand(["track"])).toBe("track");
    expect(parseCommand(["serve", "--verbose"])).toBe("serve");
    expect(parseCommand(["report"])).toBeNull();
    expect(parseCommand([])).toBeNull();
  });

  it("should use distinct exit codes", () => {
    expect(EXIT).toEqual({ ok: 0, fatal: 1, usage: 2 });
  });
});

describe("runCommand", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tracker-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function configFor(dataDir: string) {
    return loadConfig({ DATA_DIR: dataDir, CHART_DIR: path.join(dir, "charts") });
  }

  it("should dry-run with mock prices and write only the chart", async () => {
    fs.writeFileSync(path.join(dir, "holdings.json"), JSON.stringify([position("TCS", 3600, 2, "2024-02-01")]));
    fs.writeFileSync(path.join(dir, MOCK_PRICES_FILE), JSON.stringify({ TCS: 3780 }));
    const cfg = configFor(dir);

    const result = await runCommand("test", cfg, createRuntime(cfg, {}));

    expect(result.kind).toBe("exit");
    if (result.kind !== "exit") return;
    expect(result.code).toBe(0);
    expect(result.outcome?.report?.summary.totalPlPercentage).toBe(5);
    expect(fs.readdirSync(dir).sort()).toEqual(["charts", "holdings.json", MOCK_PRICES_FILE]);
    expect(fs.readdirSync(path.join(dir, "charts")).map((f) => path.extname(f)).sort()).toEqual([".png", ".svg"]);
  });

  it("should exit with the fatal code when holdings are missing", async () => {
    const cfg = configFor(path.join(dir, "empty"));
    const result = await runCommand("analyze", cfg, createRuntime(cfg, {}));
    expect(result).toMatchObject({ kind: "exit", code: EXIT.fatal });
  });

  it("should start and stop the scheduler", async () => {
    const cfg = configFor(dir);
    const result = await runCommand("schedule", cfg, createRuntime(cfg, {}));
    expect(result.kind).toBe("running");
    if (result.kind === "running") await result.handle.stop();
  });
});
