/**
 * Sprint Analyst — the four query entry points behind the assistant and
 * the CLI. Each fetches tickets through the injected gateway and hands them
 * to the matching aggregator.
 *
 * Gateway failures come back as `{ ok: false }` outcomes carrying the
 * backend's message; they are logged here and never retried.
 */

import { analyzeSprintHealth } from "./analysis/sprint-health.js";
import { buildStandupDigest } from "./analysis/standup.js";
import { triageImpediments } from "./analysis/impediments.js";
import {
  buildVelocityTrend,
  compareChronologically,
  predictVelocity,
  selectRecentSprints,
} from "./analysis/velocity.js";
import type { TicketGateway } from "./gateway/ticket-gateway.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import {
  failure,
  success,
  type Failed,
  type ImpedimentReport,
  type Outcome,
  type Sprint,
  type SprintHealthAnalysis,
  type StandupDigest,
  type Ticket,
  type VelocityAnalysis,
} from "./types.js";

export const OPEN_SPRINT_ASSIGNED_JQL = "sprint in openSprints() AND assignee is not EMPTY";
export const OPEN_SPRINT_BLOCKED_JQL =
  "sprint in openSprints() AND (status = 'Blocked' OR labels = 'blocked')";

export interface SprintAnalystOptions {
  gateway: TicketGateway;
  boardId: string;
  logger?: Logger;
  /** Clock used for "yesterday" in standups. */
  now?: () => Date;
}

export class SprintAnalyst {
  private readonly gateway: TicketGateway;
  private readonly boardId: string;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: SprintAnalystOptions) {
    this.gateway = options.gateway;
    this.boardId = options.boardId;
    this.log = options.logger ?? defaultLogger.child({ component: "analyst" });
    this.now = options.now ?? (() => new Date());
  }

  /**
   * The board's active sprint. With several active sprints (parallel
   * sprints on one board) the most recently started one is used.
   */
  async resolveActiveSprint(signal?: AbortSignal): Promise<Outcome<Sprint>> {
    const sprints = await this.gateway.getBoardSprints(this.boardId, "active", signal);
    if (!sprints.ok) return this.reportFailure("resolve-active-sprint", sprints);

    // Newest first; sprints without a start date sort as oldest
    const [latest, ...others] = [...sprints.value].sort(compareChronologically).reverse();
    if (!latest) {
      return failure("no-data", `No active sprint found on board ${this.boardId}`);
    }
    if (others.length > 0) {
      this.log.warn(
        { boardId: this.boardId, chosen: latest.id, others: others.map((s) => s.id) },
        "several active sprints, using the most recently started",
      );
    }
    return success(latest);
  }

  /** Health of `sprintId`, or of the active sprint when no id is given. */
  async health(sprintId?: string, signal?: AbortSignal): Promise<Outcome<SprintHealthAnalysis>> {
    let sprint: Sprint;
    if (sprintId === undefined) {
      const active = await this.resolveActiveSprint(signal);
      if (!active.ok) return active;
      sprint = active.value;
    } else {
      const info = await this.gateway.getSprint(sprintId, signal);
      if (!info.ok) return this.reportFailure("health", info);
      sprint = info.value;
    }

    const tickets = await this.gateway.searchIssues(
      `sprint = ${sprint.id}`,
      ["status", "summary", "assignee", this.gateway.storyPointsField, "labels", "priority"],
      signal,
    );
    if (!tickets.ok) return this.reportFailure("health", tickets);

    const result = analyzeSprintHealth(tickets.value);
    this.log.info(
      { sprint: sprint.id, issues: result.totalIssues, healthScore: result.healthScore },
      "sprint health analyzed",
    );
    return success({ sprint, result });
  }

  /**
   * Velocity of the last `count` closed sprints of the board, with a
   * next-sprint prediction. The per-sprint queries run concurrently.
   */
  async velocity(
    count: number,
    boardId: string = this.boardId,
    signal?: AbortSignal,
  ): Promise<Outcome<VelocityAnalysis>> {
    const closed = await this.gateway.getBoardSprints(boardId, "closed", signal);
    if (!closed.ok) return this.reportFailure("velocity", closed);

    const recent = selectRecentSprints(closed.value, count);
    const fetched = await Promise.all(
      recent.map(async (sprint) => ({
        sprint,
        done: await this.gateway.searchIssues(
          `sprint = ${sprint.id} AND status = Done`,
          [this.gateway.storyPointsField],
          signal,
        ),
      })),
    );

    const entries: Array<{ sprint: Sprint; doneTickets: Ticket[] }> = [];
    for (const { sprint, done } of fetched) {
      if (!done.ok) return this.reportFailure("velocity", done);
      entries.push({ sprint, doneTickets: done.value });
    }

    const trend = buildVelocityTrend(entries);
    const prediction = predictVelocity(trend);
    this.log.info(
      { boardId, sprints: trend.length, prediction: prediction.status },
      "velocity analyzed",
    );
    return success({ boardId, trend, prediction });
  }

  /** Per-person digest of the open sprint for the daily standup. */
  async standup(signal?: AbortSignal): Promise<Outcome<StandupDigest>> {
    const tickets = await this.gateway.searchIssues(
      OPEN_SPRINT_ASSIGNED_JQL,
      ["summary", "status", "assignee", "updated", "priority"],
      signal,
    );
    if (!tickets.ok) return this.reportFailure("standup", tickets);

    const digest = buildStandupDigest(tickets.value, this.now());
    this.log.info(
      { activeMembers: digest.activeMembers, inProgress: digest.totalInProgress },
      "standup digest built",
    );
    return success(digest);
  }

  /** Blocked tickets of the open sprint, categorized. */
  async impediments(signal?: AbortSignal): Promise<Outcome<ImpedimentReport>> {
    const tickets = await this.gateway.searchIssues(
      OPEN_SPRINT_BLOCKED_JQL,
      ["summary", "assignee", "status", "priority", "updated", "labels"],
      signal,
    );
    if (!tickets.ok) return this.reportFailure("impediments", tickets);

    const report = triageImpediments(tickets.value);
    this.log.info({ impediments: report.total }, "impediments triaged");
    return success(report);
  }

  private reportFailure(operation: string, outcome: Failed): Failed {
    this.log.warn({ operation, ...outcome.failure }, "ticket query failed");
    return outcome;
  }
}
