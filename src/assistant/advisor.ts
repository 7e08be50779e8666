/**
 * Copilot Advisor — free-form LLM reasoning over ACP.
 *
 * Each conversation session gets its own ACP session, primed with the
 * Scrum-master system prompt on first use.
 */

import { AcpClient, type AcpClientOptions } from "../acp/client.js";
import { logger } from "../logger.js";

const log = logger.child({ component: "advisor" });

export const SYSTEM_PROMPT = `You are an experienced Scrum Master assisting a software team.
You receive sprint reports computed from the team's ticket tracker (sprint health, velocity, standup digests, impediments) together with the team's questions.
Base every statement on the data you were given; do not invent tickets, people or numbers.
Keep answers short and actionable: at most five bullet points, plain Markdown, no tables.`;

/** Free-form reasoning backend used by the assistant. */
export interface Advisor {
  ask(sessionId: string, prompt: string): Promise<string>;
  /** Drop the backend session that belongs to `sessionId`. */
  forget(sessionId: string): void;
  shutdown(): Promise<void>;
}

export interface CopilotAdvisorOptions {
  client: AcpClientOptions;
  /** Working directory for ACP sessions. */
  cwd: string;
  timeoutMs?: number;
}

export class CopilotAdvisor implements Advisor {
  private client: AcpClient | null = null;
  private connecting: Promise<AcpClient> | null = null;
  private readonly acpSessions = new Map<string, string>();
  private readonly options: CopilotAdvisorOptions;

  constructor(options: CopilotAdvisorOptions) {
    this.options = options;
  }

  /** Lazy-connects on first use; concurrent callers share the connection attempt. */
  private async ensureClient(): Promise<AcpClient> {
    if (this.client?.connected) return this.client;
    if (this.connecting) return this.connecting;

    this.connecting = (async () => {
      const client = new AcpClient(this.options.client);
      await client.connect();
      this.client = client;
      this.acpSessions.clear();
      log.info("advisor ACP client connected");
      return client;
    })();

    try {
      return await this.connecting;
    } finally {
      this.connecting = null;
    }
  }

  private async sessionFor(client: AcpClient, sessionId: string): Promise<string> {
    const existing = this.acpSessions.get(sessionId);
    if (existing) return existing;

    const acpSessionId = await client.createSession(this.options.cwd);
    await client.sendPrompt(acpSessionId, SYSTEM_PROMPT, this.options.timeoutMs);
    this.acpSessions.set(sessionId, acpSessionId);
    log.info({ sessionId, acpSessionId }, "advisor session primed");
    return acpSessionId;
  }

  async ask(sessionId: string, prompt: string): Promise<string> {
    const client = await this.ensureClient();
    const acpSessionId = await this.sessionFor(client, sessionId);
    const result = await client.sendPrompt(acpSessionId, prompt, this.options.timeoutMs);
    return result.response.trim();
  }

  forget(sessionId: string): void {
    const acpSessionId = this.acpSessions.get(sessionId);
    if (acpSessionId === undefined) return;
    this.client?.endSession(acpSessionId);
    this.acpSessions.delete(sessionId);
  }

  async shutdown(): Promise<void> {
    this.acpSessions.clear();
    if (this.client) {
      await this.client.disconnect();
      this.client = null;
    }
    log.info("advisor shut down");
  }
}
