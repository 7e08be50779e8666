// Config loader: parse sprint-analyst.config.yaml with Zod validation

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";

export const DEFAULT_CONFIG_FILE = "sprint-analyst.config.yaml";

// --- Zod Schemas ---

const NameValueSchema = z.object({
  name: z.string().min(1),
  value: z.string(),
});

const McpServerStdioSchema = z.object({
  command: z.string().min(1).default("uvx"),
  args: z.array(z.string()).default(["mcp-atlassian"]),
  env: z.array(NameValueSchema).default([]),
});

const JiraToolsSchema = z.object({
  search_issues: z.string().min(1).default("search_issues"),
  get_sprint: z.string().min(1).default("get_sprint"),
  get_board_sprints: z.string().min(1).default("get_board_sprints"),
});

const JiraSchema = z.object({
  board_id: z.coerce.string().min(1).default("1"),
  story_points_field: z.string().min(1).default("customfield_10016"),
  server: McpServerStdioSchema.default({}),
  tools: JiraToolsSchema.default({}),
});

const CopilotSchema = z.object({
  enabled: z.boolean().default(false),
  executable: z.string().min(1).default("copilot"),
  session_timeout_ms: z.number().int().min(0).default(120000),
  auto_approve_tools: z.boolean().default(false),
  allow_tool_patterns: z.array(z.string()).default([]),
});

const AssistantSchema = z.object({
  default_sprint_count: z.number().int().min(1).default(5),
  history_limit: z.number().int().min(2).default(20),
  llm_insights: z.boolean().default(true),
});

const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export const ConfigFileSchema = z.object({
  jira: JiraSchema.default({}),
  copilot: CopilotSchema.default({}),
  assistant: AssistantSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
export type McpServerConfig = z.infer<typeof McpServerStdioSchema>;
export type JiraToolNames = z.infer<typeof JiraToolsSchema>;

// --- Environment variable substitution ---

/** Replace `${VAR}` placeholders with values from process.env */
export function substituteEnvVars(text: string): string {
  return text.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
    return process.env[varName] ?? "";
  });
}

// --- Loader ---

/**
 * Load and validate sprint-analyst.config.yaml.
 * @param configPath – absolute or relative path to YAML config file.
 *   Defaults to `sprint-analyst.config.yaml` in the current working directory.
 */
export function loadConfig(configPath?: string): ConfigFile {
  const resolvedPath = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    throw new Error(`Config file not found: ${resolvedPath}`);
  }

  const raw = fs.readFileSync(resolvedPath, "utf-8");
  const substituted = substituteEnvVars(raw);
  // An empty file parses to null; treat it as "all defaults".
  const parsed: unknown = parseYaml(substituted, { customTags: [] }) ?? {};

  return ConfigFileSchema.parse(parsed);
}
