import type { Outcome, Sprint, SprintState, Ticket } from "../types.js";

/**
 * Read-only query interface to the ticket tracker.
 *
 * Implementations never throw for backend problems: an unconnected backend
 * yields a `gateway-unavailable` failure, an error answer a `gateway-error`
 * failure carrying the backend's message.
 */
export interface TicketGateway {
  /** Run a JQL query, requesting only `fields`. */
  searchIssues(jql: string, fields: readonly string[], signal?: AbortSignal): Promise<Outcome<Ticket[]>>;
  getSprint(sprintId: string, signal?: AbortSignal): Promise<Outcome<Sprint>>;
  getBoardSprints(boardId: string, state: SprintState, signal?: AbortSignal): Promise<Outcome<Sprint[]>>;
  /** Id of the custom field holding story-point estimates. */
  readonly storyPointsField: string;
}
