import type { SprintHealthResult, Ticket } from "../types.js";
import { clamp, isDone, percent, roundTo, sumStoryPoints } from "../metrics.js";

const PROGRESS_WEIGHT = 0.8;
const BLOCKER_PENALTY = 10;
const MAX_BLOCKER_PENALTY = 30;

/** A ticket is blocking when its status or any of its labels mentions "blocked". */
export function isBlocker(ticket: Ticket): boolean {
  if (ticket.status.name.toLowerCase().includes("blocked")) return true;
  return ticket.labels.some((label) => label.toLowerCase().includes("blocked"));
}

/**
 * Health score in [0, 100]: 80% of issue progress, minus 10 points per
 * blocker (at most 30), rounded to one decimal.
 */
export function calculateHealthScore(progress: number, blockerCount: number): number {
  const base = progress * PROGRESS_WEIGHT;
  const penalty = Math.min(blockerCount * BLOCKER_PENALTY, MAX_BLOCKER_PENALTY);
  return clamp(roundTo(base - penalty), 0, 100);
}

export function sprintRecommendations(progress: number, blockerCount: number): string[] {
  const recommendations: string[] = [];

  if (progress < 50) {
    recommendations.push("Sprint progress is behind - consider daily check-ins and scope review");
  }
  if (blockerCount > 0) {
    recommendations.push(`${blockerCount} blockers need immediate attention`);
  }
  if (blockerCount > 3) {
    recommendations.push("High number of blockers - schedule impediment removal session");
  }
  if (progress > 80) {
    recommendations.push("Sprint is on track - maintain current momentum");
  }

  return recommendations;
}

const NO_ISSUES: SprintHealthResult = {
  status: "no-issues",
  totalIssues: 0,
  completedIssues: 0,
  totalStoryPoints: 0,
  completedStoryPoints: 0,
  progressPercentage: 0,
  storyPointProgress: 0,
  blockers: [],
  healthScore: 0,
  recommendations: [],
};

/**
 * Aggregate progress, story points and blockers for the tickets of one sprint.
 * Score and recommendations use the unrounded issue progress.
 */
export function analyzeSprintHealth(tickets: readonly Ticket[]): SprintHealthResult {
  const totalIssues = tickets.length;
  if (totalIssues === 0) return { ...NO_ISSUES };

  const done = tickets.filter(isDone);
  const totalStoryPoints = sumStoryPoints(tickets);
  const completedStoryPoints = sumStoryPoints(done);

  const progress = (done.length / totalIssues) * 100;
  const blockers = tickets.filter(isBlocker);

  return {
    status: "analyzed",
    totalIssues,
    completedIssues: done.length,
    totalStoryPoints,
    completedStoryPoints,
    progressPercentage: roundTo(progress),
    storyPointProgress: percent(completedStoryPoints, totalStoryPoints),
    blockers,
    healthScore: calculateHealthScore(progress, blockers.length),
    recommendations: sprintRecommendations(progress, blockers.length),
  };
}
