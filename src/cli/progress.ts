/**
 * ProgressReporter
 *
 * Provides structured console output for CLI operations.
 */

import { ErrorHandler } from '../errors/index.js';

export class ProgressReporter {
  constructor(private readonly verbose = true) {}

  startTask(name: string): void {
    if (this.verbose) console.log(`⏳ ${name}...`);
  }

  completeTask(name: string): void {
    if (this.verbose) console.log(`✅ ${name}`);
  }

  failTask(name: string, err: unknown): void {
    console.error(`❌ ${name}: ${ErrorHandler.toUserMessage(err)}`);
  }

  logInfo(message: string): void {
    if (this.verbose) console.log(`ℹ️  ${message}`);
  }

  warn(message: string): void {
    console.warn(`⚠️  ${message}`);
  }
}
