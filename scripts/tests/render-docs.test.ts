/**
 * CLI tests: argument handling, exit codes and output layout
 */

import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { main } from "../render-docs";

const MODEL = {
  types: [
    {
      kind: "class",
      name: "OrderQueue",
      namespace: "Shop.Orders",
      summary: "Buffers incoming orders.",
      methods: [{ kind: "method", signature: "bool TryEnqueue(Order order)", modifiers: "public" }],
      nestedTypes: [{ kind: "enum", name: "Priority", parent: "OrderQueue", namespace: "Shop.Orders" }],
    },
    { kind: "interface", name: "IOrderStore" },
  ],
};

let tempDir: string;
let outDir: string;

function writeJson(name: string, data: unknown): string {
  const path = join(tempDir, name);
  writeFileSync(path, JSON.stringify(data));
  return path;
}

describe("render-docs CLI", () => {
  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), "render-docs-test-"));
    outDir = join(tempDir, "pdf");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  test("writes one PDF per top-level type", async () => {
    const model = writeJson("model.json", MODEL);
    expect(await main([model, "-o", outDir, "-j", "2", "--strict"])).toBe(0);
    expect(existsSync(join(outDir, "Shop.Orders", "OrderQueue.pdf"))).toBe(true);
    expect(existsSync(join(outDir, "_global", "IOrderStore.pdf"))).toBe(true);
    expect(readdirSync(join(outDir, "Shop.Orders"))).toEqual(["OrderQueue.pdf"]);
  });

  test("output directory can come from the config file", async () => {
    const model = writeJson("model.json", MODEL);
    const config = writeJson("apidoc.json", { outDir, theme: { pageSize: "Letter" } });
    expect(await main([model, "--config", config])).toBe(0);
    expect(existsSync(join(outDir, "_global", "IOrderStore.pdf"))).toBe(true);
  });

  test("help exits cleanly", async () => {
    expect(await main(["--help"])).toBe(0);
    expect(console.log).toHaveBeenCalled();
  });

  test("usage errors exit with 2", async () => {
    expect(await main([])).toBe(2);
    expect(await main(["a.json", "b.json"])).toBe(2);
    expect(await main(["model.json", "--bogus"])).toBe(2);
    expect(await main(["model.json", "-j", "many"])).toBe(2);
  });

  test("--no-strict overrides strict mode from the config file", async () => {
    const model = writeJson("model.json", MODEL);
    const config = writeJson("apidoc.json", { strict: true });
    expect(await main([model, "-c", config, "-o", outDir, "--no-strict"])).toBe(0);
    expect(console.log).toHaveBeenCalledWith("  Strict         no");
    expect(console.log).not.toHaveBeenCalledWith("  Strict         yes");
  });

  test("strict mode from the config file applies without a flag", async () => {
    const model = writeJson("model.json", MODEL);
    const config = writeJson("apidoc.json", { strict: true });
    expect(await main([model, "-c", config, "-o", outDir])).toBe(0);
    expect(console.log).toHaveBeenCalledWith("  Strict         yes");
  });

  test("--strict and --no-strict together are a usage error", async () => {
    expect(await main(["model.json", "--strict", "--no-strict"])).toBe(2);
  });

  test("an unreadable model exits with 1", async () => {
    expect(await main([join(tempDir, "missing.json"), "-o", outDir])).toBe(1);
    expect(existsSync(outDir)).toBe(false);
  });

  test("an invalid config exits with 1", async () => {
    const model = writeJson("model.json", MODEL);
    const config = writeJson("apidoc.json", { concurrency: -3 });
    expect(await main([model, "-c", config, "-o", outDir])).toBe(1);
  });

  test("a failed document sets exit code 1 and writes nothing for it", async () => {
    const model = writeJson("model.json", MODEL);
    const config = writeJson("apidoc.json", { theme: { fonts: { sans: "NoSuchFont" } } });
    expect(await main([model, "-c", config, "-o", outDir])).toBe(1);
    expect(existsSync(join(outDir, "Shop.Orders", "OrderQueue.pdf"))).toBe(false);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining("OrderQueue"));
  });

  test("an empty model renders nothing", async () => {
    const model = writeJson("model.json", { types: [] });
    expect(await main([model, "-o", outDir])).toBe(0);
    expect(existsSync(outDir)).toBe(false);
  });
});
