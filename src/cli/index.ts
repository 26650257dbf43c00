#!/usr/bin/env tsx

/**
 * CLI entry point for mdnav, a terminal markdown pager with followable local links
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { viewCommand } from "./commands/view";
import { linksCommand } from "./commands/links";
import { renderCommand } from "./commands/render";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("mdnav")
  .description("Page through markdown documents and follow their local links")
  .version("0.1.0");

// Interactive pager (default action)
program
  .argument("[file]", "Markdown document to open")
  .option("-r, --root <dir>", "Directory links may not escape")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-n, --line-numbers", "Show line numbers")
  .option("--no-watch", "Do not reload the document when it changes")
  .option("-v, --verbose", "Verbose logging")
  .action(viewCommand);

// View command - same pager, explicit form
program
  .command("view <file>")
  .description("Open a document in the interactive pager")
  .option("-r, --root <dir>", "Directory links may not escape")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-n, --line-numbers", "Show line numbers")
  .option("--no-watch", "Do not reload the document when it changes")
  .option("-v, --verbose", "Verbose logging")
  .action(viewCommand);

// Links command - list followable links of a document
program
  .command("links <file>")
  .description("List the followable links of a document")
  .option("-r, --root <dir>", "Directory links may not escape")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--json", "Print the links as JSON")
  .action(linksCommand);

// Render command - print a rendered document
program
  .command("render <file>")
  .description("Print a rendered document")
  .option("-r, --root <dir>", "Directory links may not escape")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-n, --line-numbers", "Show line numbers")
  .option("--focus <index>", "Highlight the link at this index")
  .action(renderCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location and defaults")
  .action(configCommand);

await program.parseAsync();
