import { describe, expect, it } from "vitest";
import { extractStructuredBlock, findBalancedBlocks, stripCodeFences, tryParseJson } from "./jsonParser";

const isNamed = (value: unknown): { name: string } | null =>
  value && typeof value === "object" && "name" in value && typeof value.name === "string" ? { name: value.name } : null;

describe("jsonParser", () => {
  it("strips code fences", () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it("finds top-level blocks and ignores braces inside strings", () => {
    expect(findBalancedBlocks('x {"a":"}"} y {"b":{"c":1}} {unterminated')).toEqual(['{"a":"}"}', '{"b":{"c":1}}']);
  });

  it("repairs almost-JSON", () => {
    expect(tryParseJson("{'ok': true, 'items': [1, 2,],}")).toEqual({ ok: true, items: [1, 2] });
  });

  it("returns the first block the predicate accepts", () => {
    const text = 'first {"other": 1} then {"name": "deck"} and {"name": "later"}';
    expect(extractStructuredBlock(text, isNamed)).toEqual({ name: "deck" });
  });

  it("returns null when nothing is acceptable", () => {
    expect(extractStructuredBlock("no json here at all", isNamed)).toBeNull();
    expect(extractStructuredBlock('{"other": 1}', isNamed)).toBeNull();
  });
});
