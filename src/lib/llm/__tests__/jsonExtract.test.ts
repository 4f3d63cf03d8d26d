import { describe, it, expect } from "vitest";
import { parseJsonObject } from "../jsonExtract.js";

describe("parseJsonObject", () => {
  it("parses a bare reply", () => {
    expect(parseJsonObject('  {"total_score": 80} ')).toEqual({ total_score: 80 });
  });

  it("unwraps a fenced block inside prose", () => {
    expect(parseJsonObject('Sure:\n```json\n{"a": {"b": 1}}\n```\nThanks {x}')).toEqual({ a: { b: 1 } });
  });

  it("falls back to the outermost braces", () => {
    expect(parseJsonObject('Result: {"a": "}", "b": [1]} done')).toEqual({ a: "}", b: [1] });
  });

  it("reports a reply without an object", () => {
    expect(() => parseJsonObject("no json")).toThrow("No JSON object found. Output: no json");
  });

  it("reports unparseable braces with a truncated preview", () => {
    const text = `{"a": 1,} ${"x".repeat(500)}`;
    expect(() => parseJsonObject(text)).toThrow(/^JSON parse failed: .*Output: \{"a": 1,\} x+\.\.\.$/);
    expect(() => parseJsonObject(text)).toThrow(`Output: ${text.slice(0, 400)}...`);
  });
});
