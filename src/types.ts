// Shared type definitions for the Sprint Analyst

// --- Tickets & Sprints (parsed at the gateway boundary) ---

export type StatusCategory = "todo" | "in-progress" | "done";

export interface TicketStatus {
  name: string;
  category: StatusCategory;
}

export interface Ticket {
  key: string;
  summary: string;
  status: TicketStatus;
  /** Display name, or "Unassigned". */
  assignee: string;
  priority: string;
  labels: readonly string[];
  /** Story-point estimate; 0 when the ticket is not estimated. */
  storyPoints: number;
  /** Last-updated timestamp as reported by the backend (ISO 8601), if requested. */
  updated: string | null;
}

export type SprintState = "future" | "active" | "closed";

export interface Sprint {
  id: string;
  name: string;
  state: SprintState;
  startDate: string | null;
  endDate: string | null;
}

export const UNASSIGNED = "Unassigned";

// --- Failures ---

/**
 * - `gateway-unavailable`: the backend session was never established.
 * - `gateway-error`: the backend answered with an error (or an unreadable payload).
 * - `no-data`: the query worked but there is nothing to analyze.
 */
export type FailureKind = "gateway-unavailable" | "gateway-error" | "no-data";

export interface AnalysisFailure {
  kind: FailureKind;
  message: string;
}

export interface Succeeded<T> {
  ok: true;
  value: T;
}

export interface Failed {
  ok: false;
  failure: AnalysisFailure;
}

/** Result of a gateway call or an analysis: a payload, or the reason there is none. */
export type Outcome<T> = Succeeded<T> | Failed;

export function success<T>(value: T): Succeeded<T> {
  return { ok: true, value };
}

export function failure(kind: FailureKind, message: string): Failed {
  return { ok: false, failure: { kind, message } };
}

// --- Intent routing ---

export type Intent =
  | "sprint-health"
  | "velocity"
  | "standup"
  | "impediments"
  | "general-help";

// --- Sprint Health ---

export interface SprintHealthResult {
  status: "analyzed" | "no-issues";
  totalIssues: number;
  completedIssues: number;
  totalStoryPoints: number;
  completedStoryPoints: number;
  /** Completed / total issues, in percent, one decimal. */
  progressPercentage: number;
  /** Completed / total story points, in percent, one decimal. */
  storyPointProgress: number;
  blockers: readonly Ticket[];
  healthScore: number;
  recommendations: readonly string[];
}

export interface SprintHealthAnalysis {
  sprint: Sprint;
  result: SprintHealthResult;
}

// --- Velocity ---

export interface VelocityPoint {
  sprintId: string;
  sprintName: string;
  velocity: number;
  startDate: string | null;
  endDate: string | null;
}

export type VelocityConfidence = "high" | "medium";

export type VelocityPrediction =
  | {
      status: "predicted";
      conservative: number;
      realistic: number;
      optimistic: number;
      averageVelocity: number;
      confidence: VelocityConfidence;
      sampleSize: number;
    }
  | { status: "no-data"; message: string };

export interface VelocityAnalysis {
  boardId: string;
  trend: readonly VelocityPoint[];
  prediction: VelocityPrediction;
}

// --- Standup ---

export interface StandupItem {
  key: string;
  summary: string;
}

export interface MemberUpdate {
  completedYesterday: StandupItem[];
  inProgress: StandupItem[];
}

export interface StandupDigest {
  /** Report date (YYYY-MM-DD, local calendar). */
  date: string;
  /** Insertion-ordered per-assignee buckets, including the "Unassigned" bucket. */
  members: ReadonlyMap<string, MemberUpdate>;
  activeMembers: number;
  totalInProgress: number;
}

// --- Impediments ---

export type ImpedimentCategory = "technical" | "external" | "process" | "resource";

export interface Impediment {
  key: string;
  summary: string;
  category: ImpedimentCategory;
  assignee: string;
  priority: string;
}

export interface ImpedimentReport {
  total: number;
  impediments: readonly Impediment[];
  categories: Readonly<Record<ImpedimentCategory, number>>;
  resolutionStrategies: readonly string[];
}
