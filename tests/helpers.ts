import type { Sprint, Ticket } from "../src/types.js";

export function makeTicket(overrides: Partial<Ticket> = {}): Ticket {
  return {
    key: "PROJ-1",
    summary: "Implement login form",
    status: { name: "To Do", category: "todo" },
    assignee: "Alice",
    priority: "Medium",
    labels: [],
    storyPoints: 0,
    updated: null,
    ...overrides,
  };
}

export function makeSprint(overrides: Partial<Sprint> = {}): Sprint {
  return {
    id: "10",
    name: "Sprint 10",
    state: "closed",
    startDate: "2024-03-01T09:00:00.000Z",
    endDate: "2024-03-14T17:00:00.000Z",
    ...overrides,
  };
}

export const DONE = { name: "Done", category: "done" } as const;
export const IN_PROGRESS = { name: "In Progress", category: "in-progress" } as const;
export const BLOCKED = { name: "Blocked", category: "in-progress" } as const;
