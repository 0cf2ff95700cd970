#!/usr/bin/env tsx
/**
 * Preflight check: verify API credentials are live before serving.
 *
 * Makes one lightweight call to each service. Reports pass/fail.
 * Usage: npm run preflight
 */

import { loadConfig, loadEnvFile } from "../config";
import { describeTargets, runPreflight, type CheckResult } from "./preflight-checks";

const R = "\x1b[0m";
const BOLD = "\x1b[1m";
const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const YELLOW = "\x1b[33m";
const DIM = "\x1b[2m";

function formatResult(result: CheckResult): string {
  switch (result.status) {
    case "pass":
      return `  ${GREEN}PASS${R}  ${result.name}: ${result.message}`;
    case "fail":
      return `  ${RED}FAIL${R}  ${result.name}: ${result.message}`;
    case "skip":
      return `  ${YELLOW}SKIP${R}  ${result.name}  ${DIM}(${result.message})${R}`;
  }
}

async function main() {
  console.log(`\n${BOLD}Preflight check: verifying API credentials${R}\n`);

  loadEnvFile();
  const config = loadConfig();
  for (const [label, value] of describeTargets(config)) {
    console.log(`  ${DIM}${label.padEnd(10)}${R}${value}`);
  }
  console.log();

  const results = await runPreflight(config);

  for (const result of results) {
    console.log(formatResult(result));
  }

  const failures = results.filter((r) => r.status === "fail").length;

  console.log();
  if (failures > 0) {
    console.log(`${RED}${failures} check(s) failed.${R} Fix before serving.\n`);
    process.exit(1);
  } else {
    console.log(`${GREEN}All checks passed.${R} Ready to analyze ${config.server.watchlist.length} watchlist ticker(s) with ${config.analysis.model}.\n`);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
