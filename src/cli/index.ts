#!/usr/bin/env node
import { Command } from "commander";
import {
  runDoctor,
  runTicket,
  runUsage,
  showSession,
  type CliOpts,
} from "./runners.js";

const program = new Command()
  .name("resolver")
  .description("Support ticket resolver - staged LLM workflow with a deterministic dispatcher")
  .option("--model <name>", "default model for every stage")
  .option("--sessions-dir <dir>", "where session artifacts are written (default: ./sessions)")
  .option("--data-dir <dir>", "historical tickets, table schemas and tables (default: ./data)")
  .option("--prompts-dir <dir>", "directory with prompt overrides")
  .option("--max-iterations <n>", "stage visit budget per run")
  .option("--deadline <ms>", "abort the run after this many milliseconds")
  .option("--debug", "Verbose logging of prompts, routing and advice")
  .option("--quiet", "Minimal output (no spinners, only errors)");

const globalOpts = (): CliOpts => program.opts<CliOpts>();

program
  .command("run")
  .description("Resolve a ticket (default: the bundled sample ticket)")
  .argument("[ticket...]", "ticket text")
  .action(async (ticket: string[]) => {
    process.exitCode = await runTicket(ticket, globalOpts());
  });
program
  .command("show")
  .description("Print the stage artifacts of a session")
  .argument("<sessionId>", "session id")
  .action(async (sessionId: string) => showSession(sessionId, globalOpts()));
program
  .command("usage")
  .description("Print token usage for a session")
  .argument("<sessionId>", "session id")
  .action(async (sessionId: string) => runUsage(sessionId, globalOpts()));
program
  .command("doctor")
  .description("Check environment, data files and prompts")
  .action(async () => runDoctor(globalOpts()));

program.parseAsync().catch((e) => {
  console.error(e);
  process.exit(1);
});
