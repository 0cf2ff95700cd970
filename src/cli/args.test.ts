import { describe, it, expect } from "vitest";
import { UsageError, parseAnalyzeArgs } from "./args";

describe("parseAnalyzeArgs", () => {
  it("parses a ticker with every flag", () => {
    expect(parseAnalyzeArgs(["$BTC", "--hours", "12", "--max", "30", "--summary", "--json"])).toEqual({
      kind: "ticker",
      ticker: "$BTC",
      hoursBack: 12,
      maxItems: 30,
      summary: true,
      json: true,
    });
  });

  it("leaves the window to the defaults when no flags are given", () => {
    expect(parseAnalyzeArgs(["ETH"])).toEqual({
      kind: "ticker",
      ticker: "ETH",
      hoursBack: undefined,
      maxItems: undefined,
      summary: false,
      json: false,
    });
  });

  it("collects repeated --text values", () => {
    expect(parseAnalyzeArgs(["--text", "first post", "--text", "second post"])).toEqual({
      kind: "text",
      texts: ["first post", "second post"],
      json: false,
    });
  });

  it("asks for help with no arguments or -h", () => {
    expect(parseAnalyzeArgs([])).toEqual({ kind: "help" });
    expect(parseAnalyzeArgs(["$BTC", "-h"])).toEqual({ kind: "help" });
  });

  it.each([
    [["$BTC", "--hours"], "--hours needs a value"],
    [["$BTC", "--max", "ten"], '--max must be an integer, got "ten"'],
    [["$BTC", "--verbose"], "Unknown flag: --verbose"],
    [["$BTC", "$ETH"], "Unexpected argument: $ETH"],
    [["$BTC", "--text", "hi"], "Give either a ticker or --text, not both"],
    [["--summary"], "Missing ticker"],
    [["--text"], "--text needs a value"],
  ])("rejects %j", (args, message) => {
    expect(() => parseAnalyzeArgs(args)).toThrow(new UsageError(message));
  });

  it("passes out-of-range numbers through for the pipeline to reject", () => {
    expect(parseAnalyzeArgs(["$BTC", "--hours", "0"])).toMatchObject({ hoursBack: 0 });
  });
});
