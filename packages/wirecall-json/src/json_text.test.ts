import { describe, it, expect } from "vitest";
import { parseJson, stringifyJson, JsonSyntaxError } from "./json_text.ts";

describe("parseJson", () => {
  it("reads nested structures", () => {
    expect(parseJson(' {"a": [1, true, null, "x"], "b": {}} ')).toEqual({ a: [1, true, null, "x"], b: {} });
  });

  it("keeps integers beyond 2^53 exact", () => {
    expect(parseJson("18446744073709551615")).toBe(18446744073709551615n);
    expect(parseJson("-9007199254740993")).toBe(-9007199254740993n);
    expect(parseJson("9007199254740991")).toBe(9007199254740991);
    expect(parseJson("1.5e3")).toBe(1500);
  });

  it("decodes escapes, including surrogate pairs", () => {
    expect(parseJson('"a\\n\\u00e9\\ud83d\\ude00\\/"')).toBe("a\né😀/");
  });

  it("treats __proto__ as an ordinary key", () => {
    const parsed = parseJson('{"__proto__": 1}');
    expect(Object.keys(parsed ?? {})).toEqual(["__proto__"]);
  });

  it("reports where the text went wrong", () => {
    expect(() => parseJson('{"a":1')).toThrow(new JsonSyntaxError("Unexpected end of JSON input", 6));
    expect(() => parseJson("[1,]")).toThrow('Unexpected character "]" at position 3');
    expect(() => parseJson("1 2")).toThrow("Unexpected data after JSON value at position 2");
    expect(() => parseJson('"\\x"')).toThrow("Bad escape at position 1");
  });
});

describe("stringifyJson", () => {
  it("writes compact text with exact big integers", () => {
    expect(
      stringifyJson({ big: 18446744073709551615n, f: Number.NaN, s: 'q"', arr: [true, null, -1.5] }),
    ).toBe('{"big":18446744073709551615,"f":null,"s":"q\\"","arr":[true,null,-1.5]}');
  });
});
