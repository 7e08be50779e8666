// Zod schemas for the Jira-shaped payloads returned by the ticket backend.
// Everything the analyses read is validated here; downstream code only sees
// Ticket and Sprint.

import { z } from "zod";
import {
  UNASSIGNED,
  failure,
  success,
  type Outcome,
  type Sprint,
  type StatusCategory,
  type Ticket,
} from "../types.js";

export const DEFAULT_PRIORITY = "Medium";

const StatusSchema = z.object({
  name: z.string().default(""),
  statusCategory: z
    .object({ key: z.string() })
    .nullish(),
});

const IssueFieldsSchema = z
  .object({
    summary: z.string().nullish(),
    status: StatusSchema.nullish(),
    assignee: z.object({ displayName: z.string() }).nullish(),
    priority: z.object({ name: z.string() }).nullish(),
    labels: z.array(z.string()).nullish(),
    updated: z.string().nullish(),
  })
  .passthrough();

const IssueSchema = z.object({
  key: z.string().min(1),
  fields: IssueFieldsSchema.default({}),
});

export const IssueSearchSchema = z.object({
  issues: z.array(IssueSchema),
});

// Estimates of the wrong type (or negative) are treated as "not estimated".
const StoryPointsSchema = z.number().nonnegative().nullish().catch(null);

const SprintSchema = z.object({
  id: z.union([z.number(), z.string().min(1)]).transform(String),
  name: z.string().default(""),
  state: z
    .string()
    .transform((s) => s.toLowerCase())
    .pipe(z.enum(["future", "active", "closed"])),
  startDate: z.string().nullish(),
  endDate: z.string().nullish(),
});

export const SprintListSchema = z.union([
  z.object({ values: z.array(SprintSchema) }).transform((p) => p.values),
  z.array(SprintSchema),
]);

/** Map a Jira status category key (new / indeterminate / done) onto ours. */
export function toStatusCategory(key: string | undefined): StatusCategory {
  switch (key) {
    case "done":
      return "done";
    case "indeterminate":
      return "in-progress";
    default:
      return "todo";
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}

type RawIssue = z.infer<typeof IssueSchema>;

function toTicket(issue: RawIssue, storyPointsField: string): Ticket {
  const f = issue.fields;
  return {
    key: issue.key,
    summary: f.summary ?? "",
    status: {
      name: f.status?.name ?? "",
      category: toStatusCategory(f.status?.statusCategory?.key),
    },
    assignee: f.assignee?.displayName ?? UNASSIGNED,
    priority: f.priority?.name ?? DEFAULT_PRIORITY,
    labels: f.labels ?? [],
    storyPoints: StoryPointsSchema.parse(f[storyPointsField]) ?? 0,
    updated: f.updated ?? null,
  };
}

type RawSprint = z.infer<typeof SprintSchema>;

function toSprint(raw: RawSprint): Sprint {
  return {
    id: raw.id,
    name: raw.name || `Sprint ${raw.id}`,
    state: raw.state,
    startDate: raw.startDate ?? null,
    endDate: raw.endDate ?? null,
  };
}

/** Validate an issue-search payload (`{ issues: [...] }`). */
export function parseIssues(payload: unknown, storyPointsField: string): Outcome<Ticket[]> {
  const parsed = IssueSearchSchema.safeParse(payload);
  if (!parsed.success) {
    return failure("gateway-error", `Malformed issue search payload: ${describeIssues(parsed.error)}`);
  }
  return success(parsed.data.issues.map((issue) => toTicket(issue, storyPointsField)));
}

/** Validate a single sprint payload. */
export function parseSprint(payload: unknown): Outcome<Sprint> {
  const parsed = SprintSchema.safeParse(payload);
  if (!parsed.success) {
    return failure("gateway-error", `Malformed sprint payload: ${describeIssues(parsed.error)}`);
  }
  return success(toSprint(parsed.data));
}

/** Validate a board sprint listing (`{ values: [...] }` or a bare array). */
export function parseSprints(payload: unknown): Outcome<Sprint[]> {
  const parsed = SprintListSchema.safeParse(payload);
  if (!parsed.success) {
    return failure("gateway-error", `Malformed sprint list payload: ${describeIssues(parsed.error)}`);
  }
  return success(parsed.data.map(toSprint));
}
