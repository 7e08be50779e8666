/**
 * Ticket gateway backed by an MCP tool server (e.g. mcp-atlassian) spoken to
 * over stdio. The connection is owned by whoever constructs the gateway:
 * call `connect()` at startup and `close()` at shutdown.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import {
  StdioClientTransport,
  getDefaultEnvironment,
} from "@modelcontextprotocol/sdk/client/stdio.js";
import { z } from "zod";
import type { JiraToolNames, McpServerConfig } from "../config.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { failure, success, type Outcome, type Sprint, type SprintState, type Ticket } from "../types.js";
import { parseIssues, parseSprint, parseSprints } from "./schemas.js";
import type { TicketGateway } from "./ticket-gateway.js";

const CLIENT_INFO = { name: "sprint-analyst", version: "0.1.0" };

const ToolResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([]),
  isError: z.boolean().optional(),
});

export interface McpTicketGatewayOptions {
  server: McpServerConfig;
  tools: JiraToolNames;
  storyPointsField: string;
  logger?: Logger;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class McpTicketGateway implements TicketGateway {
  private client: Client | null = null;
  private readonly log: Logger;
  readonly storyPointsField: string;

  constructor(private readonly options: McpTicketGatewayOptions) {
    this.log = options.logger ?? defaultLogger.child({ component: "ticket-gateway" });
    this.storyPointsField = options.storyPointsField;
  }

  /** Spawn the MCP server and complete the protocol handshake. */
  async connect(): Promise<void> {
    if (this.client) {
      throw new Error("Ticket gateway is already connected");
    }

    const { command, args, env } = this.options.server;
    this.log.info({ command, args }, "connecting to ticket backend");

    const transport = new StdioClientTransport({
      command,
      args,
      env: {
        ...getDefaultEnvironment(),
        ...Object.fromEntries(env.map((e) => [e.name, e.value])),
      },
      stderr: "pipe",
    });
    transport.stderr?.on("data", (chunk: Buffer) => {
      this.log.debug({ stderr: chunk.toString().trimEnd() }, "ticket backend stderr");
    });

    const client = new Client(CLIENT_INFO);
    await client.connect(transport);
    this.client = client;
    this.log.info("ticket backend connected");
  }

  async close(): Promise<void> {
    if (!this.client) return;
    const client = this.client;
    this.client = null;
    await client.close();
    this.log.info("ticket backend disconnected");
  }

  get connected(): boolean {
    return this.client !== null;
  }

  async searchIssues(
    jql: string,
    fields: readonly string[],
    signal?: AbortSignal,
  ): Promise<Outcome<Ticket[]>> {
    const payload = await this.callTool(
      this.options.tools.search_issues,
      { jql, fields: [...fields] },
      signal,
    );
    if (!payload.ok) return payload;
    return parseIssues(payload.value, this.storyPointsField);
  }

  async getSprint(sprintId: string, signal?: AbortSignal): Promise<Outcome<Sprint>> {
    const payload = await this.callTool(
      this.options.tools.get_sprint,
      { sprint_id: sprintId },
      signal,
    );
    if (!payload.ok) return payload;
    return parseSprint(payload.value);
  }

  async getBoardSprints(
    boardId: string,
    state: SprintState,
    signal?: AbortSignal,
  ): Promise<Outcome<Sprint[]>> {
    const payload = await this.callTool(
      this.options.tools.get_board_sprints,
      { board_id: boardId, state },
      signal,
    );
    if (!payload.ok) return payload;
    return parseSprints(payload.value);
  }

  /** Call a tool and decode the JSON document in its first text block. */
  private async callTool(
    name: string,
    args: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<Outcome<unknown>> {
    if (!this.client) {
      return failure("gateway-unavailable", "Ticket backend not connected");
    }

    let raw: unknown;
    try {
      raw = await this.client.callTool({ name, arguments: args }, undefined, { signal });
    } catch (err: unknown) {
      this.log.error({ tool: name, error: errorMessage(err) }, "ticket backend call failed");
      return failure("gateway-error", errorMessage(err));
    }

    const result = ToolResultSchema.safeParse(raw);
    if (!result.success) {
      return failure("gateway-error", `Unexpected result shape from ${name}`);
    }

    const text = result.data.content.find((c) => c.type === "text")?.text;
    if (text === undefined) {
      return failure("gateway-error", `No content returned from ${name}`);
    }
    if (result.data.isError) {
      return failure("gateway-error", text);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch {
      return failure("gateway-error", `Non-JSON response from ${name}: ${text.slice(0, 200)}`);
    }

    // The backend reports failures as `{ "error": "..." }`
    if (typeof decoded === "object" && decoded !== null && "error" in decoded) {
      const { error } = decoded;
      return failure("gateway-error", typeof error === "string" ? error : JSON.stringify(error));
    }

    return success(decoded);
  }
}
