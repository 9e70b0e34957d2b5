/**
 * Launch Reporter
 *
 * All operator-facing output from the launch sequence goes through a
 * LaunchReporter so the steps can be exercised without a terminal.
 */

import chalk from 'chalk';

export interface LaunchReporter {
  /** A step is starting */
  step(scope: string, message: string): void;
  info(scope: string, message: string): void;
  success(scope: string, message: string): void;
  warn(scope: string, message: string): void;
  error(scope: string, message: string): void;
  /** Unprefixed line, used for banners and the summary */
  line(text?: string): void;
}

export class ConsoleReporter implements LaunchReporter {
  step(scope: string, message: string): void {
    console.log(chalk.cyan(`[${scope}]`), message);
  }

  info(scope: string, message: string): void {
    console.log(chalk.gray(`[${scope}]`), message);
  }

  success(scope: string, message: string): void {
    console.log(chalk.green(`[${scope}] ✓`), message);
  }

  warn(scope: string, message: string): void {
    console.warn(chalk.yellow(`[${scope}] ⚠`), message);
  }

  error(scope: string, message: string): void {
    console.error(chalk.red(`[${scope}] ✗`), message);
  }

  line(text: string = ''): void {
    console.log(text);
  }
}

export type ReportLevel = 'step' | 'info' | 'success' | 'warn' | 'error' | 'line';

export interface ReportEntry {
  level: ReportLevel;
  scope: string;
  message: string;
}

/**
 * Reporter that keeps every entry in memory
 */
export class RecordingReporter implements LaunchReporter {
  readonly entries: ReportEntry[] = [];

  step(scope: string, message: string): void {
    this.entries.push({ level: 'step', scope, message });
  }

  info(scope: string, message: string): void {
    this.entries.push({ level: 'info', scope, message });
  }

  success(scope: string, message: string): void {
    this.entries.push({ level: 'success', scope, message });
  }

  warn(scope: string, message: string): void {
    this.entries.push({ level: 'warn', scope, message });
  }

  error(scope: string, message: string): void {
    this.entries.push({ level: 'error', scope, message });
  }

  line(text: string = ''): void {
    this.entries.push({ level: 'line', scope: '', message: text });
  }

  messages(level?: ReportLevel): string[] {
    return this.entries
      .filter(e => level === undefined || e.level === level)
      .map(e => e.message);
  }
}
