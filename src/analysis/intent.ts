/**
 * Intent routing — maps free-text questions to one of the analyses.
 *
 * Rules are evaluated top to bottom; the first rule with a keyword contained
 * in the lower-cased text wins. Text matching no rule gets general help.
 */

import type { Intent } from "../types.js";

export interface IntentRule {
  intent: Exclude<Intent, "general-help">;
  keywords: readonly string[];
}

export const INTENT_RULES: readonly IntentRule[] = [
  { intent: "sprint-health", keywords: ["sprint", "health", "progress", "status"] },
  { intent: "velocity", keywords: ["velocity", "capacity", "prediction", "planning"] },
  { intent: "standup", keywords: ["standup", "daily", "meeting", "coordination"] },
  { intent: "impediments", keywords: ["blocker", "impediment", "blocked", "stuck"] },
];

export const DEFAULT_SPRINT_COUNT = 5;

/** Return the first rule whose keywords appear in `text`, if any. */
export function matchIntentRule(
  text: string,
  rules: readonly IntentRule[] = INTENT_RULES,
): IntentRule | undefined {
  const lower = text.toLowerCase();
  return rules.find((rule) => rule.keywords.some((k) => lower.includes(k)));
}

export function classifyIntent(text: string): Intent {
  return matchIntentRule(text)?.intent ?? "general-help";
}

/**
 * Sprint id named in the text ("how is sprint 42 doing?" → "42").
 * Returns undefined when the text doesn't mention a sprint with a number,
 * in which case the caller resolves the active sprint.
 */
export function extractSprintId(text: string): string | undefined {
  if (!text.toLowerCase().includes("sprint")) return undefined;
  const match = text.match(/\d+/);
  return match?.[0];
}

/** Number of sprints asked for ("last 3 sprints" → 3), or {@link DEFAULT_SPRINT_COUNT}. */
export function extractSprintCount(
  text: string,
  fallback: number = DEFAULT_SPRINT_COUNT,
): number {
  const match = text.toLowerCase().match(/(\d+)\s*sprints?/);
  if (!match?.[1]) return fallback;
  return Number.parseInt(match[1], 10);
}
