import { describe, it, expect, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigFileSchema, loadConfig, substituteEnvVars } from "../src/config.js";

function writeTmpConfig(content: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
  const file = path.join(dir, "sprint-analyst.config.yaml");
  fs.writeFileSync(file, content, "utf-8");
  return file;
}

const VALID_YAML = `
jira:
  board_id: 12
  story_points_field: "customfield_10028"
  server:
    command: "docker"
    args: ["run", "-i", "--rm", "mcp-atlassian"]
    env:
      - name: "JIRA_URL"
        value: "https://jira.example.test"
  tools:
    search_issues: "jira_search"

copilot:
  enabled: true
  session_timeout_ms: 60000
  allow_tool_patterns: ["jira_"]

assistant:
  default_sprint_count: 3
  history_limit: 10
  llm_insights: false

logging:
  level: "debug"
`;

describe("loadConfig", () => {
  afterEach(() => {
    delete process.env["TEST_JIRA_TOKEN"];
  });

  it("loads and validates a complete config file", () => {
    const config = loadConfig(writeTmpConfig(VALID_YAML));

    expect(config.jira.board_id).toBe("12");
    expect(config.jira.story_points_field).toBe("customfield_10028");
    expect(config.jira.server).toEqual({
      command: "docker",
      args: ["run", "-i", "--rm", "mcp-atlassian"],
      env: [{ name: "JIRA_URL", value: "https://jira.example.test" }],
    });
    expect(config.jira.tools).toEqual({
      search_issues: "jira_search",
      get_sprint: "get_sprint",
      get_board_sprints: "get_board_sprints",
    });
    expect(config.copilot).toEqual({
      enabled: true,
      executable: "copilot",
      session_timeout_ms: 60000,
      auto_approve_tools: false,
      allow_tool_patterns: ["jira_"],
    });
    expect(config.assistant).toEqual({ default_sprint_count: 3, history_limit: 10, llm_insights: false });
    expect(config.logging.level).toBe("debug");
  });

  it("applies defaults to an empty file", () => {
    const config = loadConfig(writeTmpConfig(""));

    expect(config.jira.board_id).toBe("1");
    expect(config.jira.story_points_field).toBe("customfield_10016");
    expect(config.jira.server).toEqual({ command: "uvx", args: ["mcp-atlassian"], env: [] });
    expect(config.copilot.enabled).toBe(false);
    expect(config.assistant.default_sprint_count).toBe(5);
    expect(config.assistant.history_limit).toBe(20);
    expect(config.logging.level).toBe("info");
  });

  it("substitutes environment variables", () => {
    process.env["TEST_JIRA_TOKEN"] = "test-secret";
    const config = loadConfig(writeTmpConfig(`
jira:
  server:
    env:
      - name: JIRA_API_TOKEN
        value: "\${TEST_JIRA_TOKEN}"
`));
    expect(config.jira.server.env).toEqual([{ name: "JIRA_API_TOKEN", value: "test-secret" }]);
  });

  it("throws for a missing file", () => {
    const missing = path.join(os.tmpdir(), "does-not-exist", "sprint-analyst.config.yaml");
    expect(() => loadConfig(missing)).toThrow(`Config file not found: ${missing}`);
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig(writeTmpConfig("assistant:\n  default_sprint_count: 0\n"))).toThrow();
    expect(() => loadConfig(writeTmpConfig("logging:\n  level: verbose\n"))).toThrow();
  });
});

describe("substituteEnvVars", () => {
  afterEach(() => {
    delete process.env["TEST_BOARD"];
  });

  it("replaces known variables and blanks unknown ones", () => {
    process.env["TEST_BOARD"] = "42";
    expect(substituteEnvVars("board ${TEST_BOARD}, token ${TEST_UNSET_VAR_XYZ}")).toBe("board 42, token ");
  });

  it("leaves text without placeholders alone", () => {
    expect(substituteEnvVars("plain $HOME text")).toBe("plain $HOME text");
  });
});

describe("ConfigFileSchema", () => {
  it("coerces a numeric board id to a string", () => {
    expect(ConfigFileSchema.parse({ jira: { board_id: 7 } }).jira.board_id).toBe("7");
  });
});
