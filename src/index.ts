#!/usr/bin/env node
// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.

/**
 * Sprint Analyst CLI — conversational Scrum assistant over the team's ticket tracker.
 *
 * Usage:
 *   sprint-analyst health [--sprint <id>]
 *   sprint-analyst velocity [--count <n>] [--board <id>]
 *   sprint-analyst standup
 *   sprint-analyst impediments
 *   sprint-analyst ask <question...>
 *   sprint-analyst chat
 */

import { Command } from "commander";
import { registerCommands } from "./cli/commands.js";
import { logger } from "./logger.js";

const program = new Command();

program
  .name("sprint-analyst")
  .description("Sprint health, velocity, standup and impediment analysis from your ticket tracker")
  .version("0.1.0")
  .option("--config <path>", "Path to config file", "sprint-analyst.config.yaml");

registerCommands(program);

program.parseAsync().catch((err: unknown) => {
  logger.error({ err }, "command failed");
  process.exit(1);
});
