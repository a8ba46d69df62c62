import { describe, it, expect } from "vitest";
import { t } from "@wirecall/postcard";
import { defineService, param, belongsTo } from "./service.ts";

const Foo = defineService("Foo", (method) => ({
  bar: method("bar", [param("a", t.string), param("b", t.i32)], t.string),
  ping: method("ping", [], t.unit),
}));

describe("defineService", () => {
  it("assigns indices in declaration order", () => {
    expect(Foo.methods.bar.id).toEqual({ name: "bar", index: 0 });
    expect(Foo.methods.ping.id).toEqual({ name: "ping", index: 1 });
    expect(Foo.list.map((m) => m.id.name)).toEqual(["bar", "ping"]);
  });

  it("keeps parameters in order", () => {
    expect(Foo.methods.bar.params.map((p) => p.name)).toEqual(["a", "b"]);
  });

  it("rejects duplicate method names", () => {
    expect(() =>
      defineService("Dup", (method) => ({
        a: method("same", [], t.unit),
        b: method("same", [], t.unit),
      })),
    ).toThrow("Duplicate method same in service Dup");
  });

  it("rejects duplicate parameter names", () => {
    expect(() =>
      defineService("Dup", (method) => ({
        a: method("a", [param("x", t.u8), param("x", t.u8)], t.unit),
      })),
    ).toThrow("Duplicate parameter x in Dup.a");
  });
});

describe("belongsTo", () => {
  const Other = defineService("Other", (method) => ({
    bar: method("bar", [param("a", t.string), param("b", t.i32)], t.string),
  }));

  it("matches only methods declared by the service", () => {
    expect(belongsTo(Foo, Foo.methods.bar)).toBe(true);
    expect(belongsTo(Foo, Other.methods.bar)).toBe(false);
  });
});
