import type { Sprint, Ticket, VelocityPoint, VelocityPrediction } from "../types.js";
import { mean, roundTo, sumStoryPoints } from "../metrics.js";

/** Sprints needed before a prediction is considered high-confidence. */
const HIGH_CONFIDENCE_SAMPLES = 5;

const SCENARIO_FACTORS = {
  conservative: 0.8,
  realistic: 0.9,
  optimistic: 1.1,
} as const;

function timeOf(date: string | null): number {
  if (!date) return Number.NEGATIVE_INFINITY;
  const t = Date.parse(date);
  return Number.isNaN(t) ? Number.NEGATIVE_INFINITY : t;
}

function compareIds(a: string, b: string): number {
  const na = Number(a);
  const nb = Number(b);
  if (Number.isFinite(na) && Number.isFinite(nb)) return na - nb;
  return a.localeCompare(b);
}

/** Oldest-first ordering: start date, then sprint id. */
export function compareChronologically(
  a: { startDate: string | null; id: string },
  b: { startDate: string | null; id: string },
): number {
  const byDate = timeOf(a.startDate) - timeOf(b.startDate);
  if (byDate !== 0 && !Number.isNaN(byDate)) return byDate;
  return compareIds(a.id, b.id);
}

/** The `count` most recent sprints, oldest first. */
export function selectRecentSprints(sprints: readonly Sprint[], count: number): Sprint[] {
  if (count <= 0) return [];
  const ordered = [...sprints].sort(compareChronologically);
  return ordered.slice(-count);
}

/**
 * Velocity of one sprint. `doneTickets` is the result of the sprint's
 * done-only query; every ticket in it counts.
 */
export function sprintVelocity(sprint: Sprint, doneTickets: readonly Ticket[]): VelocityPoint {
  return {
    sprintId: sprint.id,
    sprintName: sprint.name,
    velocity: sumStoryPoints(doneTickets),
    startDate: sprint.startDate,
    endDate: sprint.endDate,
  };
}

/**
 * Velocity points in chronological order, whatever order the per-sprint
 * queries completed in.
 */
export function buildVelocityTrend(
  entries: ReadonlyArray<{ sprint: Sprint; doneTickets: readonly Ticket[] }>,
): VelocityPoint[] {
  return entries
    .map(({ sprint, doneTickets }) => sprintVelocity(sprint, doneTickets))
    .sort((a, b) =>
      compareChronologically(
        { startDate: a.startDate, id: a.sprintId },
        { startDate: b.startDate, id: b.sprintId },
      ),
    );
}

/** Mean velocity over every point shown, zero-velocity sprints included. */
export function averageVelocity(points: readonly VelocityPoint[]): number {
  return mean(points.map((p) => p.velocity));
}

/**
 * Next-sprint capacity scenarios from historical velocity. Sprints with no
 * completed points are treated as mis-tracked and left out of the average.
 */
export function predictVelocity(points: readonly VelocityPoint[]): VelocityPrediction {
  const velocities = points.map((p) => p.velocity).filter((v) => v > 0);

  if (velocities.length === 0) {
    return { status: "no-data", message: "No velocity data available" };
  }

  const avg = mean(velocities);

  return {
    status: "predicted",
    conservative: Math.floor(avg * SCENARIO_FACTORS.conservative),
    realistic: Math.floor(avg * SCENARIO_FACTORS.realistic),
    optimistic: Math.floor(avg * SCENARIO_FACTORS.optimistic),
    averageVelocity: roundTo(avg),
    confidence: velocities.length >= HIGH_CONFIDENCE_SAMPLES ? "high" : "medium",
    sampleSize: velocities.length,
  };
}
