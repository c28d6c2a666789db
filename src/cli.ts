#!/usr/bin/env node
/**
 * base-n command line entry point.
 *
 * Wires configuration, logging and process I/O into the commands in
 * ./cli/commands.ts and turns their results into output and an exit code.
 */

import { Command } from "commander";
import { readFile } from "node:fs/promises";
import { buffer } from "node:stream/consumers";

import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import {
  executeAlphabets,
  executeDecode,
  executeEncode,
  type CodecCommandOptions,
  type CommandContext,
  type CommandIO,
} from "./cli/commands.js";
import { printResult } from "./cli/output.js";
import { failure, toNumericExitCode, type CliResult } from "./cli/result.js";

const processIO: CommandIO = {
  readInput: async (file) => (file === undefined ? buffer(process.stdin) : readFile(file)),
  writeOutput: (data) => {
    process.stdout.write(data);
  },
};

function finish(result: CliResult): void {
  printResult(result);
  if (result.kind === "failure") {
    process.exitCode = toNumericExitCode(result.exitCode);
  }
}

const loaded = loadConfig(process.env);

if (loaded.kind === "invalid") {
  finish(
    failure("Invalid environment configuration", {
      exitCode: { kind: "misuse" },
      details: loaded.issues.map((issue) => `${issue.path}: ${issue.message}`),
    })
  );
} else {
  const context: CommandContext = {
    io: processIO,
    logger: createLogger(loaded.config.logLevel),
    config: loaded.config,
  };

  const program = new Command();

  program
    .name("base-n")
    .description("Encode and decode bytes with any power-of-two alphabet")
    .version("0.1.0");

  program
    .command("encode [file]")
    .description("Encode a file (or stdin) and print the text")
    .option("-a, --alphabet <name>", "alphabet name, or chars:<symbols><padding>")
    .option("-s, --separator <separator>", "text placed between encoded symbols")
    .action(async (file: string | undefined, options: CodecCommandOptions) => {
      context.logger.debug({ command: "encode", file }, "Running command");
      finish(await executeEncode(context, file, options));
    });

  program
    .command("decode [file]")
    .description("Decode text from a file (or stdin) and write the bytes")
    .option("-a, --alphabet <name>", "alphabet name, or chars:<symbols><padding>")
    .option("-s, --separator <separator>", "text placed between encoded symbols")
    .option("--lenient", "accept missing padding, stray separators and unused tail bits")
    .action(async (file: string | undefined, options: CodecCommandOptions) => {
      context.logger.debug({ command: "decode", file }, "Running command");
      finish(await executeDecode(context, file, options));
    });

  program
    .command("alphabets")
    .description("List the built-in alphabets")
    .action(() => {
      finish(executeAlphabets());
    });

  await program.parseAsync(process.argv);
}
