import { describe, expect, it } from "vitest";
import { PatternError } from "../errors.js";
import { compilePattern, wildcardToExpression } from "../pattern.js";

describe("wildcardToExpression", () => {
  it("turns * and ? into groups, spaces into \\s and escapes dots", () => {
    expect(wildcardToExpression("Screenshot from * ??-??-??.png")).toBe(
      String.raw`Screenshot\sfrom\s(.*)\s(.)(.)-(.)(.)-(.)(.)\.png`,
    );
  });

  it("escapes regex syntax characters outside classes", () => {
    expect(wildcardToExpression("a+b(1){2}|$^.txt")).toBe(String.raw`a\+b\(1\)\{2\}\|\$\^\.txt`);
  });

  it("copies character classes and translates [! to [^", () => {
    expect(wildcardToExpression("file[0-9].txt")).toBe(String.raw`file[0-9]\.txt`);
    expect(wildcardToExpression("[!a]*")).toBe("[^a](.*)");
    expect(wildcardToExpression("[*?]x")).toBe("[*?]x");
  });
});

describe("compilePattern (wildcard)", () => {
  it("anchors the whole name", () => {
    const p = compilePattern("*.txt", "wildcard");
    expect(p.groupCount).toBe(1);
    expect(p.regex.test("a.txt")).toBe(true);
    expect(p.regex.test(".txt")).toBe(true);
    expect(p.regex.test("a.txt.bak")).toBe(false);
    expect(p.regex.test("atxt")).toBe(false);
  });

  it("? matches exactly one character", () => {
    const p = compilePattern("?.md", "wildcard");
    expect(p.regex.test("a.md")).toBe(true);
    expect(p.regex.test("ab.md")).toBe(false);
    expect(p.regex.test(".md")).toBe(false);
  });

  it("? matches one code point, not one UTF-16 unit", () => {
    const p = compilePattern("?.txt", "wildcard");
    expect(p.regex.test("é.txt")).toBe(true);
    expect(p.regex.test("😀.txt")).toBe(true);
  });

  it("a space accepts any single whitespace character", () => {
    const p = compilePattern("a b", "wildcard");
    expect(p.regex.test("a b")).toBe(true);
    expect(p.regex.test("a\tb")).toBe(true);
    expect(p.regex.test("a  b")).toBe(false);
  });

  it("treats metacharacters literally", () => {
    const p = compilePattern("a+b(1).txt", "wildcard");
    expect(p.groupCount).toBe(0);
    expect(p.regex.test("a+b(1).txt")).toBe(true);
    expect(p.regex.test("aab1.txt")).toBe(false);
  });

  it("supports explicit classes", () => {
    const p = compilePattern("file[0-9].txt", "wildcard");
    expect(p.regex.test("file3.txt")).toBe(true);
    expect(p.regex.test("filex.txt")).toBe(false);
    const negated = compilePattern("[!a]*", "wildcard");
    expect(negated.regex.test("b1")).toBe(true);
    expect(negated.regex.test("a1")).toBe(false);
  });

  it("rejects an unterminated class", () => {
    expect(() => compilePattern("[abc", "wildcard")).toThrow(PatternError);
  });
});

describe("compilePattern (regex)", () => {
  it("keeps the expression verbatim and counts groups", () => {
    const p = compilePattern(String.raw`^img_([0-9]+)\.jpg$`, "regex");
    expect(p.expression).toBe(String.raw`^img_([0-9]+)\.jpg$`);
    expect(p.groupCount).toBe(1);
    expect(p.regex.test("img_001.jpg")).toBe(true);
  });

  it("requires a whole-name match without user anchors", () => {
    const p = compilePattern("[0-9]+", "regex");
    expect(p.regex.test("123")).toBe(true);
    expect(p.regex.test("x123")).toBe(false);
  });

  it("matches the whole name across top-level alternation", () => {
    const p = compilePattern("a|ab", "regex");
    expect(p.regex.test("a")).toBe(true);
    expect(p.regex.test("ab")).toBe(true);
    expect(p.regex.test("abc")).toBe(false);
  });

  it("counts nested and optional groups", () => {
    expect(compilePattern("((a)(b)?)(?:c)", "regex").groupCount).toBe(3);
  });

  it("throws PatternError for invalid expressions", () => {
    expect(() => compilePattern("[unclosed", "regex")).toThrow(PatternError);
    expect(() => compilePattern("(a", "regex")).toThrow(/Invalid regex pattern "\(a"/);
  });

  it("rejects a pattern that is only valid once anchored", () => {
    expect(() => compilePattern("a)|(b", "regex")).toThrow(PatternError);
  });

  it("accepts identity escapes by compiling without the u flag", () => {
    const p = compilePattern(String.raw`img\-([0-9]+)\.jpg`, "regex");
    expect(p.regex.flags).toBe("");
    expect(p.groupCount).toBe(1);
    expect(p.regex.test("img-12.jpg")).toBe(true);
    expect(p.regex.test("img_12.jpg")).toBe(false);
  });

  it("keeps the u flag when the expression allows it", () => {
    expect(compilePattern("[0-9]+", "regex").regex.flags).toBe("u");
  });

  it("rejects an empty pattern", () => {
    expect(() => compilePattern("", "regex")).toThrow(/cannot be empty/);
  });
});
