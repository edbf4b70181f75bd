#!/usr/bin/env node
/**
 * msrv-finder - Main Entry Point
 * Finds, verifies or lists the minimum supported Rust version of a crate
 */

import { Command } from 'commander';
import { runFinder } from './cli/commands/run.js';
import type { RawRunOptions } from './cli/options/run-options.js';
import type { ModeIntent } from './reporter/types.js';

const program = new Command();

program
  .name('msrv-finder')
  .description('Find the minimum supported Rust version (MSRV) of a crate')
  .version('0.1.0');

function withRunOptions(command: Command): Command {
  return command
    .argument('[command...]', 'Check command to run for each release (after --)')
    .option('--path <dir>', 'Path to the crate', '.')
    .option('--target <triple>', 'Target triple of the toolchains to install')
    .option('--min <version>', 'Lowest release to consider (version or edition year)')
    .option('--max <version>', 'Highest release to consider')
    .option('--include-all-patch-releases', 'Consider every patch release, not only the latest')
    .option('--linear', 'Check releases one by one instead of bisecting')
    .option('--ignore-lockfile', 'Remove Cargo.lock before each check')
    .option('--output-toolchain-file', 'Write rust-toolchain.toml with the MSRV')
    .option('--no-read-min-edition', 'Do not derive the lower bound from the edition')
    .option('--output-format <format>', 'Output format: human, json or none', 'human')
    .option('--no-log', 'Disable the log file')
    .option('--log-level <level>', 'Log level: debug, info, warn or error', 'info')
    .option('--log-file <path>', 'Log file location')
    .option('--no-color', 'Disable colored output');
}

function register(name: string, intent: ModeIntent, description: string, isDefault = false): void {
  withRunOptions(program.command(name, { isDefault }))
    .description(description)
    .action(async (commandArgs: string[], _options: unknown, command: Command) => {
      try {
        const result = await runFinder(intent, command.opts<RawRunOptions>(), commandArgs);
        process.exit(result.exitCode);
      } catch (error) {
        console.error('[msrv-finder] Fatal error:', error);
        process.exit(1);
      }
    });
}

register('find', 'determine', 'Determine the MSRV (default)', true);
register('verify', 'verify', 'Check that the declared MSRV builds');
register('list', 'list', 'List the releases a search would consider');

program.parse();
