/**
 * Shared CLI helper functions — config loading, gateway/advisor factories,
 * argument parsers and the connect-run-close wrapper every command uses.
 */

import { InvalidArgumentError } from "commander";
import { loadConfig, type ConfigFile } from "../config.js";
import { McpTicketGateway } from "../gateway/mcp-gateway.js";
import { CopilotAdvisor, type Advisor } from "../assistant/advisor.js";
import { ScrumAssistant } from "../assistant/assistant.js";
import { SprintAnalyst } from "../analyst.js";
import { logger, setLogLevel } from "../logger.js";

/** Load config from the global --config option and apply its log level. */
export function loadConfigFromOpts(configPath?: string): ConfigFile {
  const config = loadConfig(configPath);
  setLogLevel(config.logging.level);
  return config;
}

export function createGateway(config: ConfigFile): McpTicketGateway {
  return new McpTicketGateway({
    server: config.jira.server,
    tools: config.jira.tools,
    storyPointsField: config.jira.story_points_field,
  });
}

/** The LLM advisor, when `copilot.enabled` is set. */
export function createAdvisor(config: ConfigFile): Advisor | undefined {
  if (!config.copilot.enabled) return undefined;
  return new CopilotAdvisor({
    cwd: process.cwd(),
    timeoutMs: config.copilot.session_timeout_ms,
    client: {
      command: config.copilot.executable,
      timeoutMs: config.copilot.session_timeout_ms,
      permissions: {
        autoApprove: config.copilot.auto_approve_tools,
        allowPatterns: config.copilot.allow_tool_patterns,
      },
    },
  });
}

export function createAssistant(
  config: ConfigFile,
  analyst: SprintAnalyst,
  advisor: Advisor | undefined,
): ScrumAssistant {
  return new ScrumAssistant({
    analyst,
    advisor,
    defaultSprintCount: config.assistant.default_sprint_count,
    historyLimit: config.assistant.history_limit,
    llmInsights: config.assistant.llm_insights,
  });
}

export interface CommandContext {
  config: ConfigFile;
  analyst: SprintAnalyst;
  signal: AbortSignal;
  /** Cancel the in-flight request, as Ctrl+C does. */
  abort: () => void;
}

/**
 * Connect the ticket backend, run `fn`, and close the backend again.
 * Ctrl+C aborts the in-flight queries instead of killing the process.
 */
export async function withAnalyst<T>(
  configPath: string | undefined,
  fn: (ctx: CommandContext) => Promise<T>,
): Promise<T> {
  const config = loadConfigFromOpts(configPath);
  const gateway = createGateway(config);
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn("received SIGINT, cancelling request");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    await gateway.connect();
    const analyst = new SprintAnalyst({ gateway, boardId: config.jira.board_id });
    return await fn({
      config,
      analyst,
      signal: controller.signal,
      abort: () => controller.abort(),
    });
  } finally {
    process.removeListener("SIGINT", onSigint);
    await gateway.close();
  }
}

/** Parse and validate a positive integer from CLI input. */
export function parsePositiveInt(value: string): number {
  const num = Number.parseInt(value, 10);
  if (Number.isNaN(num) || num < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return num;
}

/** Parse a sprint id (digits only). */
export function parseSprintId(value: string): string {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Sprint id must be numeric.");
  }
  return value;
}
