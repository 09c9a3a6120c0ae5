#!/usr/bin/env node

import dotenv from "dotenv";

// Silence dotenv 17+ console output
process.env.DOTENV_CONFIG_SILENT = "true";
dotenv.config();

import { Command } from "commander";
import { batchCommand, listTranscriptsCommand, runCommand, showTranscriptCommand } from "./commands/index.js";

const program = new Command();

program
    .name("taskloop")
    .description("Autonomous task-execution agent - CLI")
    .version("0.1.0");

/** Options shared by every command that runs tasks. */
function withAgentOptions(command: Command): Command {
    return command
        .option("-c, --catalog <path>", "Resource catalog JSON file")
        .option("--max-iterations <number>", "Iteration ceiling for each task")
        .option("--timeout <seconds>", "Per-execution timeout in seconds")
        .option("--critique", "Review proposed answers with a critic before accepting them")
        .option("--no-selector", "Show the whole catalog instead of asking the model to choose")
        .option("--working-dir <path>", "Persistent working directory for executed code")
        .option("--provider <provider>", "LLM provider override (anthropic|openai|google|bedrock|custom)")
        .option("--model <model>", "LLM model override")
        .option("--base-url <url>", "OpenAI-compatible server for a self-hosted model")
        .option("--db <path>", "Archive finished transcripts to this SQLite file")
        .option("--json", "Print the result as JSON");
}

withAgentOptions(
    program
        .command("run")
        .description("Run one task until the agent answers or gives up")
        .argument("<task>", "The task, in natural language"),
).action(runCommand);

withAgentOptions(
    program
        .command("batch")
        .description("Run every task in a JSON array file")
        .argument("<file>", "Path to a JSON array of task strings")
        .option("--concurrency <number>", "Tasks running at once (default 4)"),
).action(batchCommand);

const transcripts = program.command("transcripts").description("Inspect archived transcripts");

transcripts
    .command("list")
    .description("List archived runs, newest first")
    .option("--db <path>", "Transcript database", "taskloop.db")
    .option("--status <status>", "Only runs with this status (done|aborted)")
    .option("--limit <number>", "Maximum rows (default 20)")
    .option("--json", "Print rows as JSON")
    .action(listTranscriptsCommand);

transcripts
    .command("show")
    .description("Print one archived transcript")
    .argument("<id>", "Task id")
    .option("--db <path>", "Transcript database", "taskloop.db")
    .option("--json", "Print the record as JSON")
    .action(showTranscriptCommand);

program.parse(process.argv);
