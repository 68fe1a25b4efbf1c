#!/usr/bin/env tsx
/**
 * Golden evaluation CLI
 *
 * Runs the scripted golden conversations and reports assertion results.
 *
 * Usage:
 *   npm run golden
 *   npm run golden -- --judge      # also ask the model to judge each answer
 *   npm run golden -- --json       # machine-readable output
 *
 * Exit codes:
 *   0 - All cases passed
 *   1 - At least one case failed
 */

import "dotenv/config";
import { runGolden } from "../src/evaluation/golden.js";
import { flushMetrics } from "../src/utils/telemetry.js";

const useJudge = process.argv.includes("--judge");
const asJson = process.argv.includes("--json");

async function main(): Promise<number> {
  const results = await runGolden({ judge: useJudge });

  if (asJson) {
    console.log(JSON.stringify(results, null, 2));
  } else {
    console.log("\n=== Golden evaluation ===\n");
    for (const result of results) {
      console.log(`${result.passed ? "✅" : "❌"} ${result.testCaseId}: ${result.details.description}`);
      for (const assertion of result.details.assertions) {
        if (!assertion.passed) {
          console.log(`    ${assertion.assertion}: ${assertion.message}`);
        }
      }
      if (result.details.judge) {
        console.log(`    judge: ${result.details.judge.verdict} (${result.details.judge.reason})`);
      }
    }
    const passed = results.filter((r) => r.passed).length;
    console.log(`\n${passed}/${results.length} cases passed`);
  }

  await flushMetrics();
  return results.every((r) => r.passed) ? 0 : 1;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error("Golden run failed:", error);
    process.exit(1);
  });
