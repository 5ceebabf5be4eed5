import { describe, expect, it } from "vitest";
import { BuildContext, Namespace } from "../src/namespace.js";

describe("Namespace", () => {
  it("returns a free name unchanged", () => {
    const ns = new Namespace();
    expect(ns.allocateUnique("sig")).toBe("sig");
  });

  it("suffixes repeated requests", () => {
    const ns = new Namespace();
    expect(ns.allocateUnique("sig")).toBe("sig");
    expect(ns.allocateUnique("sig")).toBe("sig_1");
    expect(ns.allocateUnique("sig")).toBe("sig_2");
  });

  it("skips suffixed names that are already taken", () => {
    const ns = new Namespace();
    expect(ns.allocateUnique("sig_1")).toBe("sig_1");
    expect(ns.allocateUnique("sig")).toBe("sig");
    expect(ns.allocateUnique("sig")).toBe("sig_2");
    expect(ns.allocateUnique("sig_1")).toBe("sig_1_1");
  });

  it("sanitizes requested names", () => {
    const ns = new Namespace();
    expect(ns.allocateUnique("io.x")).toBe("iox");
    expect(ns.allocateUnique("3bits")).toBe("_3bits");
    expect(ns.allocateUnique("a$b_c")).toBe("ab_c");
    expect(ns.allocateUnique("é1")).toBe("_1");
  });

  it("turns empty and all-illegal prefixes into a legal name", () => {
    const ns = new Namespace();
    expect(ns.allocateUnique("")).toBe("_");
    expect(ns.allocateUnique("...")).toBe("__1");
    expect(ns.allocateUnique("x.y")).toBe("xy");
  });

  it("previews the next name without taking it", () => {
    const ns = new Namespace();
    ns.allocateUnique("sig");
    expect(ns.peek("sig")).toBe("sig_1");
    expect(ns.exists("sig_1")).toBe(false);
    expect(ns.allocateUnique("sig")).toBe("sig_1");
    expect(ns.peek("io.x")).toBe("iox");
  });

  it("never returns the same name twice", () => {
    const ns = new Namespace();
    const requests = ["a", "a_1", "a", "a_2", "a", "b", "a_1", "b_1", "b"];
    const out = requests.map((r) => ns.allocateUnique(r));
    expect(new Set(out).size).toBe(requests.length);
  });

  it("reports existence only after allocation", () => {
    const ns = new Namespace();
    expect(ns.exists("sig")).toBe(false);
    ns.allocateUnique("sig");
    expect(ns.exists("sig")).toBe(true);
    expect(ns.exists("sig_1")).toBe(false);
    const second = ns.allocateUnique("sig");
    expect(ns.exists(second)).toBe(true);
  });

  it("lists names in allocation order", () => {
    const ns = new Namespace();
    ns.allocateUnique("sig");
    ns.allocateUnique("other");
    ns.allocateUnique("sig");
    expect(ns.names()).toEqual(["sig", "other", "sig_1"]);
  });
});

describe("BuildContext", () => {
  it("creates one namespace lazily and keeps it", () => {
    const ctx = new BuildContext();
    const ns = ctx.namespace;
    ns.allocateUnique("x");
    expect(ctx.namespace).toBe(ns);
    expect(ctx.namespace.allocateUnique("x")).toBe("x_1");
  });

  it("gives separate contexts separate namespaces", () => {
    const a = new BuildContext();
    const b = new BuildContext();
    a.namespace.allocateUnique("x");
    expect(b.namespace.exists("x")).toBe(false);
    expect(b.namespace.allocateUnique("x")).toBe("x");
  });
});
