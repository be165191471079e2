import { describe, test, expect } from "vitest";
import { join } from "path";
import { parseModel } from "../lib/model";
import { namespaceDir, pdfOutputPath, safeFileName } from "../lib/output-paths";

describe("output paths", () => {
  test("safeFileName replaces characters that are not valid in file names", () => {
    expect(safeFileName('Map<K, V>')).toBe("Map_K,_V_");
    expect(safeFileName('a:b"c/d\\e|f?g*h')).toBe("a_b_c_d_e_f_g_h");
    expect(safeFileName("  Queue  ")).toBe("Queue");
  });

  test("empty namespace goes to _global", () => {
    expect(namespaceDir("out", "")).toBe(join("out", "_global"));
    expect(namespaceDir("out", "  ")).toBe(join("out", "_global"));
    expect(namespaceDir("out", "Shop.Orders")).toBe(join("out", "Shop.Orders"));
  });

  test("one file per type under its namespace", () => {
    const [type] = parseModel({ name: "Priority", parent: "OrderQueue", namespace: "Shop.Orders" });
    expect(pdfOutputPath("docs/pdf", type)).toBe(join("docs/pdf", "Shop.Orders", "OrderQueue.Priority.pdf"));

    const [global] = parseModel({ name: "Program" });
    expect(pdfOutputPath("docs/pdf", global)).toBe(join("docs/pdf", "_global", "Program.pdf"));
  });
});
