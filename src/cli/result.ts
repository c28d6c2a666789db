/**
 * Command outcomes. Commands return these; only the entry point turns them
 * into console output and an exit code.
 */

export type ExitCode =
  | { kind: "success" } // 0
  | { kind: "general_error" } // 1 - the codec rejected the alphabet or input
  | { kind: "misuse" }; // 2 - bad arguments, unreadable input

export interface CliOutput {
  readonly message: string;
  readonly details?: readonly string[];
  readonly suggestions?: readonly string[];
}

export type CliResult =
  | { readonly kind: "success"; readonly output?: CliOutput }
  | { readonly kind: "failure"; readonly exitCode: ExitCode; readonly output: CliOutput };

export function success(output?: CliOutput): CliResult {
  return { kind: "success", output };
}

export function failure(
  message: string,
  options: {
    exitCode?: ExitCode;
    details?: readonly string[];
    suggestions?: readonly string[];
  } = {}
): CliResult {
  return {
    kind: "failure",
    exitCode: options.exitCode ?? { kind: "general_error" },
    output: {
      message,
      details: options.details,
      suggestions: options.suggestions,
    },
  };
}

export function misuse(message: string, suggestions?: readonly string[]): CliResult {
  return failure(message, { exitCode: { kind: "misuse" }, suggestions });
}

export function toNumericExitCode(exitCode: ExitCode): number {
  switch (exitCode.kind) {
    case "success":
      return 0;
    case "general_error":
      return 1;
    case "misuse":
      return 2;
  }
}
