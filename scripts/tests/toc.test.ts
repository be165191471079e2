import { describe, test, expect } from "vitest";
import { DEFAULT_CONFIG } from "../lib/config";
import { parseModel } from "../lib/model";
import { compactSignature, firstSentence, sectionTitle, tocFields, tocLabel } from "../lib/pdf/toc";

const [queue] = parseModel({
  kind: "class",
  name: "OrderQueue",
  modifiers: "public sealed",
  baseTypes: ["IDisposable", "IEnumerable<Order>"],
  summary: "Buffers incoming orders.  Orders are handed out in arrival order.",
});

describe("TOC labels", () => {
  test("section title is kind and display name", () => {
    expect(sectionTitle(queue)).toBe("class OrderQueue");
    expect(sectionTitle(parseModel({ name: "Loose" })[0])).toBe("Loose");
  });

  test("firstSentence stops at the first sentence end", () => {
    expect(firstSentence("One. Two.")).toBe("One.");
    expect(firstSentence("Version 1.2 is out! More later")).toBe("Version 1.2 is out!");
    expect(firstSentence("  no   end  ")).toBe("no end");
  });

  test("compactSignature prefers the declared signature", () => {
    expect(compactSignature(queue)).toBe("public sealed class OrderQueue : IDisposable, IEnumerable<Order>");
    const [handler] = parseModel({ kind: "delegate", name: "Handler", signature: "void Handler(Order order)" });
    expect(compactSignature(handler)).toBe("void Handler(Order order)");
  });

  test("label joins the title and the snippets", () => {
    expect(tocLabel(tocFields(queue, DEFAULT_CONFIG.toc))).toBe(
      "class OrderQueue — public sealed class OrderQueue : IDisposable, IEnumerable<Order> — Buffers incoming orders."
    );
  });

  test("snippets are capped", () => {
    const cfg = { ...DEFAULT_CONFIG.toc, maxSignatureChars: 10, maxDescriptionChars: 8 };
    expect(tocFields(queue, cfg)).toEqual({
      title: "class OrderQueue",
      signature: "public se…",
      description: "Buffers…",
    });
  });

  test("empty snippets are left out", () => {
    const [bare] = parseModel({ name: "Bare" });
    expect(tocLabel(tocFields(bare, { ...DEFAULT_CONFIG.toc, includeSignature: false }))).toBe("Bare");
  });
});
