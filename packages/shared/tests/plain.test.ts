import { describe, it, expect } from "vitest";
import {
  NIL,
  bool,
  bytes,
  fromJson,
  fromPlain,
  list,
  num,
  plainKey,
  record,
  str,
  toJson,
  toPlain,
} from "../src/index.js";

describe("toPlain", () => {
  it("turns sequences into arrays and other tables into objects", () => {
    expect(toPlain(list([num(1), str("x")]))).toEqual([1, "x"]);
    expect(toPlain(record({ a: NIL }))).toEqual({ a: null });
  });

  it("keeps byte strings by default", () => {
    expect(toPlain(bytes([1, 2]))).toEqual(new Uint8Array([1, 2]));
  });

  it("rejects byte strings when asked to", () => {
    expect(() => toPlain(bytes([1]), { bytes: "reject" })).toThrow(
      String.raw`byte strings cannot be represented as JSON: b"\x01"`
    );
  });
});

describe("plainKey", () => {
  it("accepts string and number keys only", () => {
    expect(plainKey(str("k"))).toBe("k");
    expect(plainKey(num(3))).toBe("3");
    expect(() => plainKey(bool(true))).toThrow("unsupported table key: true");
  });
});

describe("JSON", () => {
  it("encodes nested values", () => {
    expect(toJson(record({ a: list([num(1), NIL]) }))).toBe('{"a":[1,null]}');
  });

  it("decodes into tables", () => {
    expect(fromJson('{"k":[true,2]}')).toEqual(record({ k: list([bool(true), num(2)]) }));
  });

  it("throws SyntaxError on malformed input", () => {
    expect(() => fromJson("{")).toThrow(SyntaxError);
  });

  it("maps undefined to nil", () => {
    expect(fromPlain(undefined)).toBe(NIL);
  });
});
