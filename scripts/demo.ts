#!/usr/bin/env tsx
/**
 * Demo conversation
 *
 * Runs a short scripted conversation for one farmer through the planner and
 * prints each answer, the water footprint and the scenarios.
 *
 * Usage:
 *   npm run demo
 *   LLM_PROVIDER=openai OPENAI_API_KEY=... npm run demo
 */

import "dotenv/config";
import { createAdvisor } from "../src/orchestrator/planner.js";
import { formatM3 } from "../src/tools/water-footprint.js";
import { flushMetrics } from "../src/utils/telemetry.js";

const FARMER_ID = "demo-farmer";

const MESSAGES = [
  "Hi, I farm near Shiraz. I have 6 hectares of wheat and tomatoes.",
  "We use flood irrigation and water is limited this year. What should I change?",
  "Would drip irrigation help with the tomatoes?",
];

async function main(): Promise<void> {
  const planner = createAdvisor();

  for (const message of MESSAGES) {
    const result = await planner.runTurn(FARMER_ID, message);

    console.log(`\n=== Turn ${result.turnIndex} ===`);
    console.log(`Farmer: ${message}`);
    console.log(`\nAdvisor (${result.answerSource}):\n${result.answer}`);

    if (result.waterFootprint) {
      console.log(`\nWater footprint: ${formatM3(result.waterFootprint.totalAppliedDemandM3)} per season`);
    }
    for (const scenario of result.scenarios) {
      console.log(
        `  ${scenario.id}: ${formatM3(scenario.footprint.totalAppliedDemandM3)} (saves ${scenario.savingsPct.toFixed(1)}%)`,
      );
    }
    if (result.diagnostics.degraded) {
      console.log(`\nIssues: ${result.diagnostics.issues.map((i) => `${i.stage}/${i.kind}`).join(", ")}`);
    }
  }

  const profile = planner.memoryBank.getProfile(FARMER_ID);
  console.log("\n=== Stored profile ===");
  console.log(JSON.stringify(profile, null, 2));

  await flushMetrics();
}

main().catch((error: unknown) => {
  console.error("Demo failed:", error);
  process.exit(1);
});
