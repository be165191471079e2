import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { ConfigError, DEFAULT_CONFIG, loadConfig, parseConfig } from "../lib/config";

describe("config", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "config-test-"));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(data: unknown): string {
    const path = join(tempDir, "apidoc.json");
    writeFileSync(path, JSON.stringify(data));
    return path;
  }

  test("defaults", () => {
    expect(DEFAULT_CONFIG.outDir).toBe("docs/pdf");
    expect(DEFAULT_CONFIG.concurrency).toBe(2);
    expect(DEFAULT_CONFIG.strict).toBe(false);
    expect(DEFAULT_CONFIG.theme.pageSize).toBe("A4");
    expect(DEFAULT_CONFIG.theme.margins).toEqual({ left: 54, right: 54, top: 72, bottom: 72 });
    expect(DEFAULT_CONFIG.theme.fonts).toEqual({ sans: "Helvetica", sansBold: "Helvetica-Bold", mono: "Courier" });
    expect(DEFAULT_CONFIG.toc).toEqual({
      wrap: true,
      includeSignature: true,
      includeDescription: true,
      maxSignatureChars: 80,
      maxDescriptionChars: 100,
      hangingIndent: 10,
    });
  });

  test("no file and no environment gives the defaults", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
  });

  test("file values merge over the defaults", () => {
    const path = writeConfig({ outDir: "build/pdf", theme: { pageSize: "Letter", margins: { left: 36 } } });
    const config = loadConfig(path, {});
    expect(config.outDir).toBe("build/pdf");
    expect(config.theme.pageSize).toBe("Letter");
    expect(config.theme.margins).toEqual({ left: 36, right: 54, top: 72, bottom: 72 });
    expect(config.concurrency).toBe(2);
  });

  test("environment overrides the file", () => {
    const path = writeConfig({ outDir: "build/pdf", concurrency: 1, theme: { pageSize: "Letter" } });
    const config = loadConfig(path, {
      APIDOC_OUT_DIR: "out",
      APIDOC_CONCURRENCY: "4",
      APIDOC_PAGE_SIZE: "legal",
      APIDOC_STRICT: "true",
    });
    expect(config.outDir).toBe("out");
    expect(config.concurrency).toBe(4);
    expect(config.theme.pageSize).toBe("Legal");
    expect(config.strict).toBe(true);
  });

  test("APIDOC_STRICT accepts 1 and treats anything else as false", () => {
    expect(loadConfig(undefined, { APIDOC_STRICT: "1" }).strict).toBe(true);
    expect(loadConfig(undefined, { APIDOC_STRICT: "no" }).strict).toBe(false);
  });

  test("malformed environment values are rejected", () => {
    expect(() => loadConfig(undefined, { APIDOC_CONCURRENCY: "zero" })).toThrow(ConfigError);
    expect(() => loadConfig(undefined, { APIDOC_CONCURRENCY: "0" })).toThrow(ConfigError);
    expect(() => loadConfig(undefined, { APIDOC_PAGE_SIZE: "A3" })).toThrow(/APIDOC_PAGE_SIZE/);
  });

  test("invalid file content names the offending field", () => {
    const path = writeConfig({ theme: { margins: { left: -1 } } });
    expect(() => loadConfig(path, {})).toThrow(/theme\.margins\.left/);
  });

  test("bad colours are rejected", () => {
    expect(() => parseConfig({ theme: { colors: { primary: "red" } } })).toThrow(/theme\.colors\.primary/);
  });

  test("unreadable file is a ConfigError", () => {
    expect(() => loadConfig(join(tempDir, "missing.json"), {})).toThrow(ConfigError);
    const path = join(tempDir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(() => loadConfig(path, {})).toThrow(/Failed to load config/);
  });
});
