/**
 * Location Audit Commands Index
 *
 * Registers the audit subcommands:
 * - run: Audit catalog datasets and write the status report
 * - check: Classify one local file
 */

import type { Command } from 'commander';
import { registerCheckCommand } from './check.js';
import { registerRunCommand } from './run.js';

export function registerLocationAuditCommands(program: Command): void {
  registerRunCommand(program);
  registerCheckCommand(program);
}
