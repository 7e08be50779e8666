/**
 * Scrum Assistant — answers one chat message: routes it to an analysis,
 * renders the report and, when an advisor is attached, adds LLM commentary.
 *
 * Conversation memory is kept per session id and is only ever read or
 * written on behalf of that session.
 */

import { classifyIntent, extractSprintCount, extractSprintId } from "../analysis/intent.js";
import type { SprintAnalyst } from "../analyst.js";
import {
  formatFailure,
  formatHelp,
  formatImpediments,
  formatSprintHealth,
  formatStandup,
  formatVelocity,
} from "../documentation/reports.js";
import { logger as defaultLogger, type AnalysisContext, type Logger } from "../logger.js";
import { success, type Intent, type Outcome } from "../types.js";
import type { Advisor } from "./advisor.js";

export interface ChatMessage {
  role: "user" | "assistant";
  content: string;
  timestamp: Date;
}

export interface AssistantReply {
  intent: Intent;
  /** Markdown answer shown to the user. */
  text: string;
  /** False when the analysis could not run (backend failure, no data). */
  ok: boolean;
}

/** The analyses the assistant can route to. */
export type SprintQueries = Pick<SprintAnalyst, "health" | "velocity" | "standup" | "impediments">;

export interface ScrumAssistantOptions {
  analyst: SprintQueries;
  advisor?: Advisor;
  /** Sprints used for velocity when the question doesn't name a count. */
  defaultSprintCount?: number;
  /** Messages kept per session (oldest dropped first). */
  historyLimit?: number;
  /** Append LLM commentary to analysis reports. */
  llmInsights?: boolean;
  logger?: Logger;
}

/** Messages of recent history included in LLM prompts. */
const PROMPT_HISTORY = 6;

export class ScrumAssistant {
  private readonly analyst: SprintQueries;
  private readonly advisor: Advisor | undefined;
  private readonly defaultSprintCount: number;
  private readonly historyLimit: number;
  private readonly llmInsights: boolean;
  private readonly memory = new Map<string, ChatMessage[]>();
  private readonly log: Logger;

  constructor(options: ScrumAssistantOptions) {
    this.analyst = options.analyst;
    this.advisor = options.advisor;
    this.defaultSprintCount = options.defaultSprintCount ?? 5;
    this.historyLimit = options.historyLimit ?? 20;
    this.llmInsights = options.llmInsights ?? true;
    this.log = options.logger ?? defaultLogger.child({ component: "assistant" });
  }

  async respond(sessionId: string, text: string, signal?: AbortSignal): Promise<AssistantReply> {
    const intent = classifyIntent(text);
    const context: AnalysisContext = { session: sessionId, intent };
    const log = this.log.child(context);
    log.info("routing message");

    const prior = this.history(sessionId);
    this.remember(sessionId, "user", text);

    const reply = intent === "general-help"
      ? { intent, text: await this.generalHelp(log, sessionId, text, prior), ok: true }
      : await this.analyze(log, sessionId, intent, text, prior, signal);

    this.remember(sessionId, "assistant", reply.text);
    return reply;
  }

  /** Conversation so far for `sessionId`, oldest first. */
  history(sessionId: string): readonly ChatMessage[] {
    return [...(this.memory.get(sessionId) ?? [])];
  }

  /** Forget a session's conversation (and its advisor session). */
  reset(sessionId: string): void {
    this.memory.delete(sessionId);
    this.advisor?.forget(sessionId);
  }

  private async analyze(
    log: Logger,
    sessionId: string,
    intent: Exclude<Intent, "general-help">,
    text: string,
    prior: readonly ChatMessage[],
    signal?: AbortSignal,
  ): Promise<AssistantReply> {
    const report = await this.runAnalysis(intent, text, signal);
    if (!report.ok) {
      return { intent, text: formatFailure(report.failure), ok: false };
    }

    const insights = await this.insights(log, sessionId, text, report.value, prior);
    const body = insights ? `${report.value}\n\n### AI Insights\n${insights}` : report.value;
    return { intent, text: body, ok: true };
  }

  private async runAnalysis(
    intent: Exclude<Intent, "general-help">,
    text: string,
    signal?: AbortSignal,
  ): Promise<Outcome<string>> {
    switch (intent) {
      case "sprint-health": {
        const outcome = await this.analyst.health(extractSprintId(text), signal);
        return outcome.ok ? success(formatSprintHealth(outcome.value)) : outcome;
      }
      case "velocity": {
        const count = extractSprintCount(text, this.defaultSprintCount);
        const outcome = await this.analyst.velocity(count, undefined, signal);
        return outcome.ok ? success(formatVelocity(outcome.value)) : outcome;
      }
      case "standup": {
        const outcome = await this.analyst.standup(signal);
        return outcome.ok ? success(formatStandup(outcome.value)) : outcome;
      }
      case "impediments": {
        const outcome = await this.analyst.impediments(signal);
        return outcome.ok ? success(formatImpediments(outcome.value)) : outcome;
      }
    }
  }

  private async insights(
    log: Logger,
    sessionId: string,
    question: string,
    report: string,
    prior: readonly ChatMessage[],
  ): Promise<string | undefined> {
    if (!this.advisor || !this.llmInsights) return undefined;

    const prompt = conversationContext(prior) + [
      `Question: ${question}`,
      "",
      "Report:",
      report,
      "",
      "Give the team your most important observations and next steps.",
    ].join("\n");

    try {
      const answer = await this.advisor.ask(sessionId, prompt);
      return answer || undefined;
    } catch (err: unknown) {
      log.warn({ err }, "advisor unavailable, returning plain report");
      return undefined;
    }
  }

  private async generalHelp(
    log: Logger,
    sessionId: string,
    text: string,
    prior: readonly ChatMessage[],
  ): Promise<string> {
    if (!this.advisor) return formatHelp();

    try {
      const answer = await this.advisor.ask(sessionId, `${conversationContext(prior)}Question: ${text}`);
      return answer || formatHelp();
    } catch (err: unknown) {
      log.warn({ err }, "advisor unavailable, returning help");
      return formatHelp();
    }
  }

  private remember(sessionId: string, role: ChatMessage["role"], content: string): void {
    const messages = this.memory.get(sessionId) ?? [];
    messages.push({ role, content, timestamp: new Date() });
    if (messages.length > this.historyLimit) {
      messages.splice(0, messages.length - this.historyLimit);
    }
    this.memory.set(sessionId, messages);
  }
}

/** Recent turns rendered for an LLM prompt; empty when there are none. */
export function conversationContext(messages: readonly ChatMessage[]): string {
  const recent = messages.slice(-PROMPT_HISTORY);
  if (recent.length === 0) return "";
  const lines = recent.map((m) => `${m.role === "user" ? "User" : "Assistant"}: ${m.content}`);
  return `Conversation so far:\n${lines.join("\n")}\n\n`;
}
