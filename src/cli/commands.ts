/**
 * CLI commands. Each takes its I/O as dependencies and returns a
 * {@link CliResult}; nothing here touches `process` directly.
 */

import { BaseN } from "../base-n.js";
import { ALPHABETS, ALPHABET_NAMES, isAlphabetName } from "../alphabets.js";
import type { BaseNConfig } from "../config.js";
import { InvalidAlphabetError, InvalidInputError } from "../errors.js";
import type { Logger } from "../logger.js";
import { failure, misuse, success, type CliResult } from "./result.js";

/** Prefix marking a literal alphabet on the command line. */
export const LITERAL_ALPHABET_PREFIX = "chars:";

export interface CommandIO {
  /** Read all bytes from a file, or from stdin when `file` is undefined. */
  readInput(file: string | undefined): Promise<Uint8Array>;
  writeOutput(data: string | Uint8Array): void;
}

export interface CommandContext {
  readonly io: CommandIO;
  readonly logger: Logger;
  readonly config: BaseNConfig;
}

export interface CodecCommandOptions {
  alphabet?: string;
  separator?: string;
  lenient?: boolean;
}

type CodecResolution =
  | { readonly kind: "ok"; readonly codec: BaseN }
  | { readonly kind: "failed"; readonly result: CliResult };

/**
 * Build the codec a command asked for: a registered name, or a literal
 * alphabet after the `chars:` prefix.
 */
export function resolveCodec(
  options: CodecCommandOptions,
  config: BaseNConfig
): CodecResolution {
  const requested = options.alphabet ?? config.defaultAlphabet;

  let alphabet: string;
  if (requested.startsWith(LITERAL_ALPHABET_PREFIX)) {
    alphabet = requested.slice(LITERAL_ALPHABET_PREFIX.length);
  } else if (isAlphabetName(requested)) {
    alphabet = ALPHABETS[requested];
  } else {
    return {
      kind: "failed",
      result: misuse(`Unknown alphabet "${requested}"`, [
        `Use one of: ${ALPHABET_NAMES.join(", ")}`,
        `Or pass a literal alphabet as ${LITERAL_ALPHABET_PREFIX}<symbols><padding>`,
      ]),
    };
  }

  try {
    const codec = new BaseN(alphabet, {
      separator: options.separator,
      strict: !options.lenient,
    });
    return { kind: "ok", codec };
  } catch (error) {
    if (error instanceof InvalidAlphabetError) {
      return {
        kind: "failed",
        result: failure(error.message, { details: [`reason: ${error.reason}`] }),
      };
    }
    throw error;
  }
}

async function readInput(
  context: CommandContext,
  file: string | undefined
): Promise<{ kind: "ok"; data: Uint8Array } | { kind: "failed"; result: CliResult }> {
  try {
    return { kind: "ok", data: await context.io.readInput(file) };
  } catch (error) {
    context.logger.debug({ err: error, file }, "Failed to read input");
    const reason = error instanceof Error ? error.message : String(error);
    return {
      kind: "failed",
      result: misuse(`Cannot read ${file ?? "stdin"}: ${reason}`),
    };
  }
}

export async function executeEncode(
  context: CommandContext,
  file: string | undefined,
  options: CodecCommandOptions
): Promise<CliResult> {
  const resolved = resolveCodec(options, context.config);
  if (resolved.kind === "failed") {
    return resolved.result;
  }

  const input = await readInput(context, file);
  if (input.kind === "failed") {
    return input.result;
  }

  context.logger.debug(
    { bytes: input.data.length, bitsPerSymbol: resolved.codec.bitsPerSymbol },
    "Encoding input"
  );
  context.io.writeOutput(resolved.codec.encode(input.data) + "\n");
  return success();
}

export async function executeDecode(
  context: CommandContext,
  file: string | undefined,
  options: CodecCommandOptions
): Promise<CliResult> {
  const resolved = resolveCodec(options, context.config);
  if (resolved.kind === "failed") {
    return resolved.result;
  }

  const input = await readInput(context, file);
  if (input.kind === "failed") {
    return input.result;
  }

  let decoded: string;
  try {
    decoded = new TextDecoder("utf-8", { fatal: true }).decode(input.data);
  } catch (error) {
    if (error instanceof TypeError) {
      context.logger.warn({ err: error }, "Input is not UTF-8");
      return failure(`Cannot decode ${file ?? "stdin"}: input is not valid UTF-8 text`);
    }
    throw error;
  }

  const text = stripFinalLineBreak(decoded);
  context.logger.debug({ characters: text.length, strict: resolved.codec.strict }, "Decoding input");

  try {
    context.io.writeOutput(resolved.codec.decode(text));
    return success();
  } catch (error) {
    if (error instanceof InvalidInputError) {
      context.logger.warn({ err: error }, "Decode failed");
      return failure(error.message, {
        details: [`reason: ${error.reason}`, `position: ${error.position}`],
        suggestions: resolved.codec.strict ? ["Retry with --lenient to accept unpadded input"] : [],
      });
    }
    throw error;
  }
}

export function executeAlphabets(): CliResult {
  const details = ALPHABET_NAMES.map((name) => {
    const codec = new BaseN(ALPHABETS[name]);
    return `${name.padEnd(10)} ${String(codec.symbols.length).padStart(5)} symbols  ${String(codec.bitsPerSymbol).padStart(2)} bits/symbol  block of ${codec.blockSize}`;
  });
  return success({ message: "Available alphabets", details });
}

function stripFinalLineBreak(text: string): string {
  if (text.endsWith("\r\n")) {
    return text.slice(0, -2);
  }
  if (text.endsWith("\n")) {
    return text.slice(0, -1);
  }
  return text;
}
