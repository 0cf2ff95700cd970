/**
 * Argument parsing for the analyze CLI, exportable for testing.
 */

export type AnalyzeCommand =
  | { kind: "ticker"; ticker: string; hoursBack?: number; maxItems?: number; summary: boolean; json: boolean }
  | { kind: "text"; texts: string[]; json: boolean }
  | { kind: "help" };

export class UsageError extends Error {
  name = "UsageError";
}

function intFlag(flag: string, value: string | undefined): number {
  if (value === undefined) throw new UsageError(`${flag} needs a value`);
  const n = Number(value);
  if (!Number.isInteger(n)) throw new UsageError(`${flag} must be an integer, got "${value}"`);
  return n;
}

/**
 * analyze <ticker> [--hours N] [--max N] [--summary] [--json]
 * analyze --text "..." [--text "..."] [--json]
 *
 * Range checks are left to the pipeline so CLI and API report them the same way.
 */
export function parseAnalyzeArgs(args: readonly string[]): AnalyzeCommand {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) return { kind: "help" };

  let ticker: string | undefined;
  let hoursBack: number | undefined;
  let maxItems: number | undefined;
  let summary = false;
  let json = false;
  const texts: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--hours") hoursBack = intFlag(arg, args[++i]);
    else if (arg === "--max") maxItems = intFlag(arg, args[++i]);
    else if (arg === "--summary") summary = true;
    else if (arg === "--json") json = true;
    else if (arg === "--text") {
      const value = args[++i];
      if (value === undefined) throw new UsageError("--text needs a value");
      texts.push(value);
    } else if (arg.startsWith("--")) throw new UsageError(`Unknown flag: ${arg}`);
    else if (ticker === undefined) ticker = arg;
    else throw new UsageError(`Unexpected argument: ${arg}`);
  }

  if (texts.length > 0) {
    if (ticker !== undefined) throw new UsageError("Give either a ticker or --text, not both");
    return { kind: "text", texts, json };
  }
  if (ticker === undefined) throw new UsageError("Missing ticker");
  return { kind: "ticker", ticker, hoursBack, maxItems, summary, json };
}
