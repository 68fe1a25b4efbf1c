/**
 * Templated answer used whenever the model cannot produce one.
 * Built only from data the turn already computed; never empty.
 */

import { formatM3 } from "../tools/water-footprint.js";
import type { CoachContext } from "./coach.js";

const MAX_TIPS = 2;

export function buildFallbackAnswer(context: Omit<CoachContext, "history">): string {
  const paragraphs: string[] = [];
  const { profile, footprint, scenarios, tips } = context;

  if (profile.mainCrops.length === 0) {
    paragraphs.push(
      "I could not work out which crops you grow yet. Tell me your crops, land size and irrigation method and I will estimate your water use.",
    );
  }

  if (footprint && footprint.crops.length > 0) {
    const crops = footprint.crops.map((c) => `${c.crop} ${formatM3(c.appliedDemandM3)}`).join(", ");
    paragraphs.push(
      `Your crops need about ${formatM3(footprint.totalAppliedDemandM3)} of irrigation water per season (${crops}).`,
    );
    const firstSwitch = footprint.recommendedSwitches[0];
    if (firstSwitch) paragraphs.push(firstSwitch);
  }

  const best = scenarios.reduce<(typeof scenarios)[number] | undefined>(
    (top, s) => (top === undefined || s.savingsPct > top.savingsPct ? s : top),
    undefined,
  );
  if (best && best.savingsPct > 0) {
    paragraphs.push(
      `Shifting part of your ${best.shiftedFrom} area to ${best.shiftedTo.join(" and ")} could save about ${best.savingsPct.toFixed(0)}% of that water.`,
    );
  }

  for (const tip of tips.slice(0, MAX_TIPS)) {
    paragraphs.push(`${tip.title}: ${tip.text}`);
  }

  if (paragraphs.length === 0) {
    paragraphs.push("I could not prepare detailed advice this time. Please try again shortly.");
  }

  return paragraphs.join("\n\n");
}
