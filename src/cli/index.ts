#!/usr/bin/env node

/**
 * CLI entry point for docpress
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { publishCommand } from "./commands/publish";
import { configCommand } from "./commands/config";
import { settingsCommand } from "./commands/settings";

const collect = (value: string, previous: string[] = []): string[] => [...previous, value];

const program = new Command();

program
  .name("docpress")
  .description("Publish plain text documents as text or HTML")
  .version("0.1.0");

// Main publish command (default action)
program
  .argument("[inputs...]", "Source files or glob patterns")
  .option("-w, --writer <name>", "Output format (text, html)", "html")
  .option("-o, --output <dir>", "Output directory", "out")
  .option("-c, --config <path>", "Configuration file applied after the standard ones")
  .option("--report-level <n>", "Report conditions at or above this severity")
  .option("--halt-level <n>", "Halt on conditions at or above this severity")
  .option("-s, --set <name=value>", "Override a setting (repeatable)", collect)
  .option("--no-source-config", "Ignore docpress.conf beside each source")
  .option("--dry-run", "Process sources without writing output")
  .option("-v, --verbose", "Verbose output")
  .action(publishCommand);

// Config command - show the configuration search path
program
  .command("config [source]")
  .description("Show the configuration files consulted for a source")
  .action(configCommand);

// Settings command - list recognized options
program
  .command("settings")
  .description("List every recognized setting with its type and default")
  .option("-w, --writer <name>", "Include the options of this writer", "html")
  .action(settingsCommand);

await program.parseAsync();
