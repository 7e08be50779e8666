/**
 * CLI command definitions — registered on the Commander program.
 */

import * as readline from "node:readline";
import * as path from "node:path";
import type { Command } from "commander";
import {
  formatFailure,
  formatImpediments,
  formatSprintHealth,
  formatStandup,
  formatVelocity,
} from "../documentation/reports.js";
import { logger, redirectLogToFile } from "../logger.js";
import type { Outcome } from "../types.js";
import {
  createAdvisor,
  createAssistant,
  parsePositiveInt,
  parseSprintId,
  withAnalyst,
} from "./helpers.js";

const CLI_SESSION = "cli";

/** Register all CLI commands on the given Commander program. */
export function registerCommands(program: Command): void {
  registerHealth(program);
  registerVelocity(program);
  registerStandup(program);
  registerImpediments(program);
  registerAsk(program);
  registerChat(program);
}

/** Print a report or its failure; a failure sets a non-zero exit code. */
function printOutcome<T>(outcome: Outcome<T>, render: (value: T) => string): void {
  if (outcome.ok) {
    console.log(render(outcome.value));
  } else {
    console.error(formatFailure(outcome.failure));
    process.exitCode = 1;
  }
}

function fail(what: string, err: unknown): never {
  logger.error({ err }, `${what} failed`);
  console.error(`❌ ${what} failed:`, err instanceof Error ? err.message : err);
  process.exit(1);
}

// --- health ---
function registerHealth(program: Command): void {
  program
    .command("health")
    .description("Sprint health: progress, story points, blockers and recommendations")
    .option("--sprint <id>", "Sprint id (defaults to the board's active sprint)", parseSprintId)
    .action(async (opts: { sprint?: string }) => {
      try {
        await withAnalyst(program.opts().config, async ({ analyst, signal }) => {
          printOutcome(await analyst.health(opts.sprint, signal), formatSprintHealth);
        });
      } catch (err: unknown) {
        fail("Sprint health analysis", err);
      }
    });
}

// --- velocity ---
function registerVelocity(program: Command): void {
  program
    .command("velocity")
    .description("Velocity of recent closed sprints and next-sprint prediction")
    .option("--count <n>", "Number of closed sprints to analyze", parsePositiveInt)
    .option("--board <id>", "Board id (defaults to jira.board_id)")
    .action(async (opts: { count?: number; board?: string }) => {
      try {
        await withAnalyst(program.opts().config, async ({ config, analyst, signal }) => {
          const count = opts.count ?? config.assistant.default_sprint_count;
          const board = opts.board ?? config.jira.board_id;
          printOutcome(await analyst.velocity(count, board, signal), formatVelocity);
        });
      } catch (err: unknown) {
        fail("Velocity analysis", err);
      }
    });
}

// --- standup ---
function registerStandup(program: Command): void {
  program
    .command("standup")
    .description("Daily standup digest for the open sprint")
    .action(async () => {
      try {
        await withAnalyst(program.opts().config, async ({ analyst, signal }) => {
          printOutcome(await analyst.standup(signal), formatStandup);
        });
      } catch (err: unknown) {
        fail("Standup report", err);
      }
    });
}

// --- impediments ---
function registerImpediments(program: Command): void {
  program
    .command("impediments")
    .description("Categorized blockers of the open sprint with resolution strategies")
    .action(async () => {
      try {
        await withAnalyst(program.opts().config, async ({ analyst, signal }) => {
          printOutcome(await analyst.impediments(signal), formatImpediments);
        });
      } catch (err: unknown) {
        fail("Impediment analysis", err);
      }
    });
}

// --- ask ---
function registerAsk(program: Command): void {
  program
    .command("ask")
    .description("Ask a free-text question; it is routed to the matching analysis")
    .argument("<question...>", "The question")
    .action(async (question: string[]) => {
      try {
        await withAnalyst(program.opts().config, async ({ config, analyst, signal }) => {
          const advisor = createAdvisor(config);
          try {
            const assistant = createAssistant(config, analyst, advisor);
            const reply = await assistant.respond(CLI_SESSION, question.join(" "), signal);
            if (reply.ok) {
              console.log(reply.text);
            } else {
              console.error(reply.text);
              process.exitCode = 1;
            }
          } finally {
            await advisor?.shutdown();
          }
        });
      } catch (err: unknown) {
        fail("Question", err);
      }
    });
}

// --- chat ---
function registerChat(program: Command): void {
  program
    .command("chat")
    .description("Interactive conversation (type 'exit' to quit)")
    .option("--log-file <path>", "Where to write logs during the chat", ".sprint-analyst/chat.log")
    .action(async (opts: { logFile: string }) => {
      redirectLogToFile(path.resolve(opts.logFile));
      try {
        await withAnalyst(program.opts().config, async ({ config, analyst, signal, abort }) => {
          const advisor = createAdvisor(config);
          const assistant = createAssistant(config, analyst, advisor);
          const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
          signal.addEventListener("abort", () => rl.close(), { once: true });
          // In a terminal readline takes Ctrl+C, so the process never sees SIGINT
          rl.on("SIGINT", abort);

          console.log("💬 Sprint Analyst — ask about sprint health, velocity, standups or blockers.");
          rl.setPrompt("> ");
          rl.prompt();
          try {
            // Ends when stdin closes (Ctrl+D) or the signal fires
            for await (const raw of rl) {
              const line = raw.trim();
              if (line === "exit" || line === "quit") break;
              if (line !== "") {
                const reply = await assistant.respond(CLI_SESSION, line, signal);
                console.log(`\n${reply.text}\n`);
              }
              rl.prompt();
            }
          } finally {
            rl.close();
            await advisor?.shutdown();
          }
        });
      } catch (err: unknown) {
        fail("Chat", err);
      }
    });
}
