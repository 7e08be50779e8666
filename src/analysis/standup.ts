import { UNASSIGNED, type MemberUpdate, type StandupDigest, type Ticket } from "../types.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local calendar date of `date` as YYYY-MM-DD. */
export function calendarDay(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** The calendar day before `now` (not a 24h window). */
export function yesterdayKey(now: Date): string {
  const d = new Date(now.getFullYear(), now.getMonth(), now.getDate() - 1);
  return calendarDay(d);
}

/**
 * Whether the ticket was last updated on `day`. Compares the date part of
 * the backend's timestamp, i.e. the day in the backend's own offset.
 */
export function updatedOn(ticket: Ticket, day: string): boolean {
  return ticket.updated?.slice(0, 10) === day;
}

/**
 * Group the open-sprint tickets of the team per assignee into "completed
 * yesterday" (done and updated yesterday) and "in progress" (regardless of
 * update date). The two filters are independent.
 */
export function buildStandupDigest(tickets: readonly Ticket[], now: Date): StandupDigest {
  const yesterday = yesterdayKey(now);
  const members = new Map<string, MemberUpdate>();

  for (const ticket of tickets) {
    let update = members.get(ticket.assignee);
    if (!update) {
      update = { completedYesterday: [], inProgress: [] };
      members.set(ticket.assignee, update);
    }

    const item = { key: ticket.key, summary: ticket.summary };

    if (ticket.status.category === "done" && updatedOn(ticket, yesterday)) {
      update.completedYesterday.push(item);
    }
    if (ticket.status.category === "in-progress") {
      update.inProgress.push(item);
    }
  }

  const updates = [...members.values()];

  return {
    date: calendarDay(now),
    members,
    activeMembers: updates.filter(
      (u) => u.completedYesterday.length > 0 || u.inProgress.length > 0,
    ).length,
    totalInProgress: updates.reduce((sum, u) => sum + u.inProgress.length, 0),
  };
}

/** Named team members in first-seen order; the unassigned bucket is left out. */
export function namedMembers(digest: StandupDigest): Array<[string, MemberUpdate]> {
  return [...digest.members.entries()].filter(([name]) => name !== UNASSIGNED);
}
