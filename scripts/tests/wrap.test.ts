import { describe, test, expect } from "vitest";
import { ellipsize, truncate, withEllipsis, wrapText } from "../lib/pdf/wrap";

// 5pt per character
const measure = (s: string) => Array.from(s).length * 5;

describe("wrapText", () => {
  test("breaks between words", () => {
    expect(wrapText("the quick brown fox", measure, 50)).toEqual(["the quick", "brown fox"]);
  });

  test("empty and blank input give one empty line", () => {
    expect(wrapText("", measure, 50)).toEqual([""]);
    expect(wrapText("   \n\t ", measure, 50)).toEqual([""]);
  });

  test("collapses runs of whitespace", () => {
    expect(wrapText("a  b\n\nc", measure, 100)).toEqual(["a b c"]);
  });

  test("hard-cuts a word longer than the line", () => {
    expect(wrapText("abcdefghijkl", measure, 25)).toEqual(["abcde", "fghij", "kl"]);
  });

  test("the last chunk of a cut word can take the next word", () => {
    expect(wrapText("abcdefg hi", measure, 25)).toEqual(["abcde", "fg hi"]);
  });

  test("a character wider than the line gets a line of its own", () => {
    const wide = (s: string) => Array.from(s).length * 30;
    expect(wrapText("WW", wide, 20)).toEqual(["W", "W"]);
  });

  test("lines fit and rejoin to the normalized text", () => {
    const text = "Waits for the next   order and removes it\nfrom the queue before returning";
    const lines = wrapText(text, measure, 60);
    for (const line of lines) {
      expect(measure(line)).toBeLessThanOrEqual(60);
    }
    expect(lines.join(" ")).toBe(text.replace(/\s+/g, " "));
  });

  test("keeps every character when cutting", () => {
    const word = "x".repeat(23);
    expect(wrapText(word, measure, 40).join("")).toBe(word);
  });
});

describe("ellipsis helpers", () => {
  test("withEllipsis shortens until the ellipsis fits", () => {
    expect(withEllipsis("abcdef", measure, 20)).toBe("abc…");
  });

  test("withEllipsis drops trailing spaces before the ellipsis", () => {
    expect(withEllipsis("ab cdef", measure, 20)).toBe("ab…");
  });

  test("ellipsize leaves fitting text alone", () => {
    expect(ellipsize("abc", measure, 20)).toBe("abc");
    expect(ellipsize("abcdefgh", measure, 20)).toBe("abc…");
  });

  test("truncate caps the character count including the ellipsis", () => {
    expect(truncate("hello   world", 20)).toBe("hello world");
    expect(truncate("abcdefghij", 5)).toBe("abcd…");
    expect(truncate("abcde", 5)).toBe("abcde");
  });
});
