import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { loadConfig, ensureDataDirs } from "./config.js";

function loadError(configPath?: string): string {
  try {
    loadConfig(configPath);
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
  return "";
}

describe("Config", () => {
  let tempDir: string;

  function writeConfig(content: string): void {
    fs.writeFileSync(path.join(tempDir, "config.yml"), content);
  }

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "notekeep-config-"));
    process.env.NOTEKEEP_DATA_DIR = tempDir;
  });

  afterEach(() => {
    delete process.env.NOTEKEEP_DATA_DIR;
    delete process.env.NOTEKEEP_TEST_TENANTS;
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should load minimal config with defaults", () => {
    writeConfig(`
tenants:
  - alice
  - bob
`);

    const config = loadConfig();

    expect(config).toEqual({
      notes: {
        dir: path.join(tempDir, "notes"),
        max_note_bytes: 1024 * 1024,
        max_asset_bytes: 10 * 1024 * 1024,
      },
      tenants: ["alice", "bob"],
      log: { level: "info" },
      data_dir: tempDir,
    });
  });

  it("should resolve notes.dir against the config file", () => {
    writeConfig(`
notes:
  dir: store
  max_note_bytes: 2048
  max_asset_bytes: "4096"
tenants: [alice]
log:
  level: debug
`);

    const config = loadConfig();

    expect(config.notes).toEqual({ dir: path.join(tempDir, "store"), max_note_bytes: 2048, max_asset_bytes: 4096 });
    expect(config.log.level).toBe("debug");
  });

  it("should load an explicit config path", () => {
    const elsewhere = path.join(tempDir, "conf");
    fs.mkdirSync(elsewhere);
    fs.writeFileSync(path.join(elsewhere, "notekeep.yml"), "tenants: [carol]\nnotes:\n  dir: ../data\n");

    const config = loadConfig(path.join(elsewhere, "notekeep.yml"));

    expect(config.tenants).toEqual(["carol"]);
    expect(config.notes.dir).toBe(path.join(tempDir, "data"));
  });

  it("should substitute env vars and split tenant strings", () => {
    process.env.NOTEKEEP_TEST_TENANTS = "alice, bob";
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeConfig("tenants: ${NOTEKEEP_TEST_TENANTS}\n");

    const config = loadConfig();

    expect(config.tenants).toEqual(["alice", "bob"]);
    expect(warn).toHaveBeenCalledWith('Config warning: tenant id " bob" has surrounding whitespace; using "bob"');
  });

  it("should fail on unset env vars", () => {
    writeConfig("tenants: ${NOTEKEEP_UNSET_VARIABLE}\n");
    expect(loadError()).toBe("Environment variable NOTEKEEP_UNSET_VARIABLE is not set");
  });

  it("should fail when the file is missing", () => {
    expect(loadError()).toBe(`Config file not found: ${path.join(tempDir, "config.yml")}`);
  });

  it("should require at least one tenant", () => {
    writeConfig("notes:\n  dir: store\n");
    expect(loadError()).toBe("Config errors:\n  - at least one tenant is required under tenants");
  });

  it("should collect every validation error", () => {
    writeConfig(`
tenants: [alice, alice, "..", "a/b"]
notes:
  max_note_bytes: 0
log:
  level: loud
`);

    expect(loadError()).toBe(
      [
        "Config errors:",
        '  - log.level must be one of debug, info, warn, error (got "loud")',
        '  - tenant id "alice" is listed twice',
        '  - tenant id ".." is reserved',
        '  - tenant id "a/b" contains a path separator or NUL',
        "  - notes.max_note_bytes must be a positive number",
      ].join("\n"),
    );
  });

  it("should create data directories and tenant roots", () => {
    writeConfig("tenants: [alice, bob]\n");
    const config = loadConfig();

    ensureDataDirs(config);

    expect(fs.existsSync(path.join(tempDir, "logs"))).toBe(true);
    expect(fs.statSync(path.join(tempDir, "notes", "alice")).isDirectory()).toBe(true);
    expect(fs.statSync(path.join(tempDir, "notes", "bob")).isDirectory()).toBe(true);
  });
});
