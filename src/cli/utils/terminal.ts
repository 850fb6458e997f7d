/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing and formatting terminal output,
 * plus the banners and formatters shared by the CLI commands.
 *
 * Usage:
 * ```typescript
 * import { bold, green, formatTutorMessage } from './terminal';
 *
 * console.log(bold('Statistics Tutor'));
 * console.log(formatTutorMessage('The median is the middle value...'));
 * ```
 *
 * In non-TTY environments the codes pass through harmlessly.
 */

import type { ReviewStage } from '../../core/models';

// =============================================================================
// Text Style Modifiers
// =============================================================================

/**
 * Makes text bold/bright in the terminal.
 *
 * @example
 * console.log(bold('Quiz Complete!'));
 */
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/**
 * Makes text dim/faded in the terminal.
 * Use for secondary information like hints, timestamps, or IDs.
 */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

/** Success messages, correct answers, newly learned facts */
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

/** Warnings, skipped steps, updated facts */
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

/** Errors and incorrect answers */
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/** The tutor's messages, to set them apart from learner input */
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats the tutor's message for display.
 *
 * @example
 * console.log(formatTutorMessage('What does the standard error measure?'));
 * // Output: "Tutor: What does the standard error measure?" in cyan
 */
export function formatTutorMessage(message: string): string {
  return cyan(`Tutor: ${message}`);
}

/**
 * Formats a horizontal separator line for visual section breaks.
 *
 * @param width - Width of the separator in characters (default: 50)
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Formats one line of command help.
 *
 * @example
 * console.log(formatCommandHelp('exit', 'Leave learn mode'));
 * // Output: "  exit       - Leave learn mode"
 */
export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

/**
 * Shortens content to `maxLength` characters, ending with an ellipsis.
 * Newlines are flattened so the result fits on one line.
 */
export function truncateContent(content: string, maxLength: number): string {
  const flat = content.replace(/\s+/g, ' ').trim();
  if (flat.length <= maxLength) {
    return flat;
  }
  return flat.substring(0, maxLength - 3) + '...';
}

/**
 * Describes when a review is due relative to `now`.
 */
export function formatDueDate(dueAt: Date, now: Date = new Date()): string {
  const daysUntilDue = Math.ceil((dueAt.getTime() - now.getTime()) / (24 * 60 * 60 * 1000));
  if (dueAt.getTime() <= now.getTime()) {
    return red('Due now');
  } else if (daysUntilDue === 1) {
    return yellow('Due within a day');
  } else {
    return dim(`Due in ${daysUntilDue} days`);
  }
}

/**
 * Colors a review stage by how far along it is.
 */
export function formatStage(stage: ReviewStage): string {
  switch (stage) {
    case 'new':
      return dim('new');
    case 'learning':
      return yellow('learning');
    case 'review':
      return cyan('review');
    case 'mastered':
      return green('mastered');
  }
}

/**
 * Renders a value in [0, 1] as a 10-character bar.
 *
 * @example
 * renderAsciiBar(0.4); // "████░░░░░░"
 */
export function renderAsciiBar(value: number): string {
  const filled = Math.round(Math.min(1, Math.max(0, value)) * 10);
  return '█'.repeat(filled) + '░'.repeat(10 - filled);
}

/**
 * Prints a blank line for visual spacing.
 */
export function printBlankLine(): void {
  console.log();
}

// =============================================================================
// Banners
// =============================================================================

/**
 * Printed when learn mode starts.
 */
export function printLearnBanner(activeFactCount: number): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold('  Statistics Tutor - Learn'));
  console.log(formatSeparator(60));
  console.log(`  Facts remembered so far: ${yellow(activeFactCount.toString())}`);
  console.log(formatSeparator(60));
  printBlankLine();
  console.log(dim('  Ask about any statistics topic. Type "exit" to finish.'));
  printBlankLine();
}

/**
 * Printed when test mode starts.
 */
export function printTestBanner(dueCount: number): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold('  Statistics Tutor - Test'));
  console.log(formatSeparator(60));
  console.log(`  Facts due for review: ${yellow(dueCount.toString())}`);
  console.log(formatSeparator(60));
  printBlankLine();
  console.log(formatCommandHelp('skip', 'Move on without answering'));
  console.log(formatCommandHelp('exit', 'End the quiz'));
  printBlankLine();
}

/**
 * Printed when a quiz ends.
 */
export function printTestSummary(answered: number, correct: number): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(green(bold('  Quiz Complete!')));
  console.log(`  Correct answers: ${yellow(`${correct}/${answered}`)}`);
  console.log(formatSeparator(60));
  printBlankLine();
}
