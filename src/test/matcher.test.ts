import { describe, expect, it } from "vitest";
import { countMatches, matchName } from "../matcher.js";
import { compilePattern } from "../pattern.js";

describe("matchName", () => {
  it("numbers wildcard groups left to right", () => {
    const p = compilePattern("Screenshot from * ??-??-??.png", "wildcard");
    const m = matchName(p, "Screenshot from 2025-05-10 22-52-47.png");
    expect(m?.captures).toEqual([
      "Screenshot from 2025-05-10 22-52-47.png",
      "2025-05-10",
      "2",
      "2",
      "5",
      "2",
      "4",
      "7",
    ]);
  });

  it("returns null when the name does not match", () => {
    const p = compilePattern("*.jpg", "wildcard");
    expect(matchName(p, "notes.txt")).toBeNull();
  });

  it("reports non-participating groups as empty strings", () => {
    const p = compilePattern("(a)?(b)", "regex");
    expect(matchName(p, "b")?.captures).toEqual(["b", "", "b"]);
  });

  it("captures non-ASCII text", () => {
    const p = compilePattern("*-*.txt", "wildcard");
    expect(matchName(p, "café-naïve.txt")?.captures).toEqual(["café-naïve.txt", "café", "naïve"]);
  });
});

describe("countMatches", () => {
  it("counts whole-name matches only", () => {
    const p = compilePattern("*.txt", "wildcard");
    expect(countMatches(["a.txt", "b.txt", "c.txt.bak", "d.md"], p)).toBe(2);
  });
});
