/**
 * Tests for CLI commands, run against in-memory I/O
 */

import { test } from "node:test";
import assert from "node:assert";
import chalk from "chalk";
import {
  executeAlphabets,
  executeDecode,
  executeEncode,
  resolveCodec,
  type CommandContext,
} from "../src/cli/commands.js";
import { formatResult } from "../src/cli/output.js";
import { failure, success, toNumericExitCode } from "../src/cli/result.js";
import { createLogger } from "../src/logger.js";
import type { BaseNConfig } from "../src/config.js";

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

const config: BaseNConfig = { logLevel: "silent", defaultAlphabet: "base64" };

interface Harness {
  context: CommandContext;
  writes: Array<string | Uint8Array>;
  logLines: string[];
}

/**
 * Build a command context whose files live in a map; the key `undefined`
 * stands for stdin.
 */
function createHarness(files: Map<string | undefined, Uint8Array>, logLevel: BaseNConfig["logLevel"] = "silent"): Harness {
  const writes: Array<string | Uint8Array> = [];
  const logLines: string[] = [];
  const context: CommandContext = {
    config,
    logger: createLogger(logLevel, {
      write: (line: string) => {
        logLines.push(line);
      },
    }),
    io: {
      readInput: async (file) => {
        const data = files.get(file);
        if (data === undefined) {
          throw new Error(`ENOENT: no such file '${file}'`);
        }
        return data;
      },
      writeOutput: (data) => {
        writes.push(data);
      },
    },
  };
  return { context, writes, logLines };
}

// ============================================================================
// encode
// ============================================================================

test("encode - reads stdin and writes text with a newline", async () => {
  const { context, writes } = createHarness(new Map([[undefined, bytes("Hello")]]));
  const result = await executeEncode(context, undefined, {});
  assert.deepStrictEqual(result, success());
  assert.deepStrictEqual(writes, ["SGVsbG8=\n"]);
});

test("encode - uses the alphabet and separator options", async () => {
  const { context, writes } = createHarness(new Map([["data.bin", Uint8Array.of(0xab, 0x01)]]));
  const result = await executeEncode(context, "data.bin", { alphabet: "base16", separator: "-" });
  assert.strictEqual(result.kind, "success");
  assert.deepStrictEqual(writes, ["A-B-0-1\n"]);
});

test("encode - accepts a literal alphabet", async () => {
  const { context, writes } = createHarness(new Map([[undefined, Uint8Array.of(0xa5)]]));
  await executeEncode(context, undefined, { alphabet: "chars:01=" });
  assert.deepStrictEqual(writes, ["10100101\n"]);
});

test("encode - unknown alphabet name is misuse", async () => {
  const { context, writes } = createHarness(new Map([[undefined, bytes("Hello")]]));
  const result = await executeEncode(context, undefined, { alphabet: "base58" });
  assert.strictEqual(result.kind, "failure");
  if (result.kind !== "failure") {
    return;
  }
  assert.deepStrictEqual(result.exitCode, { kind: "misuse" });
  assert.strictEqual(result.output.message, 'Unknown alphabet "base58"');
  assert.deepStrictEqual(writes, []);
});

test("encode - invalid literal alphabet is a general error", async () => {
  const { context } = createHarness(new Map([[undefined, bytes("Hello")]]));
  const result = await executeEncode(context, undefined, { alphabet: "chars:012=" });
  assert.strictEqual(result.kind, "failure");
  if (result.kind !== "failure") {
    return;
  }
  assert.deepStrictEqual(result.exitCode, { kind: "general_error" });
  assert.deepStrictEqual(result.output.details, ["reason: not-power-of-two"]);
});

test("encode - unreadable file is misuse", async () => {
  const { context } = createHarness(new Map());
  const result = await executeEncode(context, "missing.bin", {});
  assert.strictEqual(result.kind, "failure");
  if (result.kind !== "failure") {
    return;
  }
  assert.deepStrictEqual(result.exitCode, { kind: "misuse" });
  assert.strictEqual(
    result.output.message,
    "Cannot read missing.bin: ENOENT: no such file 'missing.bin'"
  );
});

// ============================================================================
// decode
// ============================================================================

test("decode - writes raw bytes", async () => {
  const { context, writes } = createHarness(new Map([[undefined, bytes("SGVsbG8=\n")]]));
  const result = await executeDecode(context, undefined, {});
  assert.deepStrictEqual(result, success());
  assert.deepStrictEqual(writes, [bytes("Hello")]);
});

test("decode - ignores one trailing CRLF", async () => {
  const { context, writes } = createHarness(new Map([[undefined, bytes("JBSWY3DP\r\n")]]));
  await executeDecode(context, undefined, { alphabet: "base32" });
  assert.deepStrictEqual(writes, [bytes("Hello")]);
});

test("decode - reports invalid input and logs a warning", async () => {
  const { context, writes, logLines } = createHarness(
    new Map([[undefined, bytes("SGVsbG8")]]),
    "warn"
  );
  const result = await executeDecode(context, undefined, {});
  assert.strictEqual(result.kind, "failure");
  if (result.kind !== "failure") {
    return;
  }
  assert.deepStrictEqual(result.exitCode, { kind: "general_error" });
  assert.deepStrictEqual(result.output.details, ["reason: invalid-padding", "position: 7"]);
  assert.deepStrictEqual(result.output.suggestions, ["Retry with --lenient to accept unpadded input"]);
  assert.deepStrictEqual(writes, []);

  assert.strictEqual(logLines.length, 1);
  assert.match(logLines[0], /"level":40/);
  assert.match(logLines[0], /"msg":"Decode failed"/);
});

test("decode - rejects input that is not UTF-8 text", async () => {
  // 0xff never occurs in UTF-8
  const { context, writes } = createHarness(new Map([["bad.txt", Uint8Array.of(0x53, 0xff, 0x47)]]));
  const result = await executeDecode(context, "bad.txt", {});
  assert.strictEqual(result.kind, "failure");
  if (result.kind !== "failure") {
    return;
  }
  assert.deepStrictEqual(result.exitCode, { kind: "general_error" });
  assert.strictEqual(result.output.message, "Cannot decode bad.txt: input is not valid UTF-8 text");
  assert.deepStrictEqual(writes, []);
});

test("decode - lenient option accepts unpadded input", async () => {
  const { context, writes } = createHarness(new Map([[undefined, bytes("SGVsbG8")]]));
  const result = await executeDecode(context, undefined, { lenient: true });
  assert.strictEqual(result.kind, "success");
  assert.deepStrictEqual(writes, [bytes("Hello")]);
});

test("decode - separator option", async () => {
  const { context, writes } = createHarness(new Map([["in.txt", bytes("C A F E\n")]]));
  await executeDecode(context, "in.txt", { alphabet: "base16", separator: " " });
  assert.deepStrictEqual(writes, [Uint8Array.of(0xca, 0xfe)]);
});

// ============================================================================
// alphabets and output
// ============================================================================

test("alphabets - lists every registered alphabet", () => {
  const result = executeAlphabets();
  assert.strictEqual(result.kind, "success");
  if (result.kind !== "success") {
    return;
  }
  const details = result.output?.details ?? [];
  assert.strictEqual(details.length, 13);
  assert.strictEqual(details[0], "base2          2 symbols   1 bits/symbol  block of 8");
  assert.strictEqual(details[6], "base64        64 symbols   6 bits/symbol  block of 4");
});

test("resolveCodec - falls back to the configured alphabet", () => {
  const resolved = resolveCodec({}, { logLevel: "silent", defaultAlphabet: "base32" });
  assert.strictEqual(resolved.kind, "ok");
  if (resolved.kind !== "ok") {
    return;
  }
  assert.strictEqual(resolved.codec.bitsPerSymbol, 5);
  assert.strictEqual(resolved.codec.strict, true);
});

test("formatResult - failure with details and hints", () => {
  chalk.level = 0;
  const text = formatResult(failure("boom", { details: ["reason: x"], suggestions: ["try y"] }));
  assert.strictEqual(text, "error: boom\n  reason: x\n\nhint: try y");
  assert.strictEqual(formatResult(success()), "");
  assert.strictEqual(formatResult(success({ message: "Done" })), "Done");
});

test("toNumericExitCode", () => {
  assert.strictEqual(toNumericExitCode({ kind: "success" }), 0);
  assert.strictEqual(toNumericExitCode({ kind: "general_error" }), 1);
  assert.strictEqual(toNumericExitCode({ kind: "misuse" }), 2);
});
