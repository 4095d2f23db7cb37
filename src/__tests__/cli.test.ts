import { describe, it, expect } from "vitest";
import { parseGenerateArgs, parseOutArg, stripQuotes } from "../lib/cli";

describe("stripQuotes", () => {
  it("removes quotes a terminal adds around dropped paths", () => {
    expect(stripQuotes(" '/tmp/price list.md' ")).toBe("/tmp/price list.md");
    expect(stripQuotes('"prices.md"')).toBe("prices.md");
  });
});

describe("parseGenerateArgs", () => {
  it("reads input and output paths", () => {
    expect(parseGenerateArgs(["--input", "prices.md", "--out", "sheets"])).toEqual({
      input: "prices.md",
      out: "sheets",
    });
  });

  it("takes an explicit template path", () => {
    expect(parseGenerateArgs(["--template", "brand.pdf", "--input", "prices.md"])).toEqual({
      template: "brand.pdf",
      input: "prices.md",
    });
  });

  it("uses the configured template when --template has no value", () => {
    expect(parseGenerateArgs(["--input", "prices.md", "--template"])).toEqual({ input: "prices.md", template: true });
    expect(parseGenerateArgs(["--template", "--out", "sheets"])).toEqual({ template: true, out: "sheets" });
  });

  it("leaves out flags that are missing a value", () => {
    expect(parseGenerateArgs(["--input", "--out"])).toEqual({});
  });

  it("ignores unknown arguments", () => {
    expect(parseGenerateArgs(["prices.md", "--verbose"])).toEqual({});
  });
});

describe("parseOutArg", () => {
  it("returns the value after --out", () => {
    expect(parseOutArg(["--out", "'brand.pdf'"])).toBe("brand.pdf");
    expect(parseOutArg([])).toBeUndefined();
  });
});
