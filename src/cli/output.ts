/**
 * Presentation of command results, coloured with chalk.
 */

import chalk from "chalk";
import type { CliOutput, CliResult } from "./result.js";

export function formatOutput(output: CliOutput, isError: boolean = false): string {
  const lines: string[] = [];

  lines.push(isError ? chalk.red(`error: ${output.message}`) : chalk.bold(output.message));

  if (output.details && output.details.length > 0) {
    for (const detail of output.details) {
      lines.push(`  ${detail}`);
    }
  }

  if (output.suggestions && output.suggestions.length > 0) {
    lines.push("");
    for (const suggestion of output.suggestions) {
      lines.push(chalk.gray(`hint: ${suggestion}`));
    }
  }

  return lines.join("\n");
}

/**
 * Format a result; successful commands without output give an empty string.
 */
export function formatResult(result: CliResult): string {
  switch (result.kind) {
    case "success":
      return result.output ? formatOutput(result.output) : "";
    case "failure":
      return formatOutput(result.output, true);
  }
}

export function printResult(result: CliResult): void {
  const text = formatResult(result);
  if (text.length === 0) {
    return;
  }
  if (result.kind === "failure") {
    console.error(text);
  } else {
    console.log(text);
  }
}
