/**
 * CLI Interface
 *
 * Argument parsing and command handling using Commander.
 */

import { once } from "node:events";
import * as fs from "node:fs";
import { Command, InvalidArgumentError, Option } from "commander";
import { detectTools, getTool, getToolIds } from "./adapters/index.js";
import { ReportFormatter } from "./output/formatter.js";
import { resolveConfig, type SessionConfig } from "./session/config.js";
import { AutopsySession } from "./session/controller.js";
import { AutopsyError, ConfigError } from "./session/errors.js";
import { logger } from "./util/logger.js";

export interface CliOptions {
  firstError: number;
  timeout: number;
  ex: string[];
  interactive: boolean;
  verbose: number;
  output: string[];
  valgrind?: string;
  gdb?: string;
  vgdb?: string;
  toolArg: string[];
  maxFrames?: number;
  pageHeight?: number;
}

export function parseTimeout(value: string): number {
  const match = value.match(/^(\d+)(ms|s|m)?$/);
  if (!match) {
    throw new Error(`Invalid timeout format: ${value}. Use format like "30s", "5000ms", or "2m"`);
  }

  const num = parseInt(match[1], 10);
  const unit = match[2] || "ms";

  switch (unit) {
    case "ms":
      return num;
    case "s":
      return num * 1000;
    case "m":
      return num * 60 * 1000;
    default:
      return num;
  }
}

function parseTimeoutOption(value: string): number {
  try {
    return parseTimeout(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError(`Expected a whole number, got "${value}"`);
  }
  return parseInt(value, 10);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function increase(_value: string, previous: number): number {
  return previous + 1;
}

export function createCli(): Command {
  const program = new Command();

  program
    .name("vg-autopsy")
    .description("Run a program under Valgrind and report each memory error with the state GDB finds at it")
    .version("0.1.0")
    .enablePositionalOptions()
    .passThroughOptions();

  // Main command (default)
  program
    .argument("<program>", "Program to run under Valgrind")
    .argument("[args...]", "Arguments passed to the program")
    .addOption(
      new Option("-f, --first-error <n>", "Number of the first error to debug")
        .argParser(parseCount)
        .default(1)
    )
    .addOption(
      new Option("-t, --timeout <duration>", "Idle timeout for each debugger response (e.g., 30s, 5000ms, 2m)")
        .argParser(parseTimeoutOption)
        .default(30000, "30s")
    )
    .option("-x, --ex <command>", "Debugger command to run before attaching (repeatable)", collect, [])
    .option("-i, --interactive", "Hand the debugger to the terminal at each error", false)
    .option("-v, --verbose", "More diagnostics on stderr (repeatable)", increase, 0)
    .option("-o, --output <path>", 'Write reports to this file, "-" for stdout (repeatable)', collect, [])
    .option("--valgrind <path>", "Valgrind executable")
    .option("--gdb <path>", "GDB executable")
    .option("--vgdb <path>", "vgdb executable used by GDB to reach Valgrind")
    .option("--tool-arg <arg>", "Extra Valgrind argument placed before the program (repeatable)", collect, [])
    .option("--max-frames <n>", "Deepest frame to inspect", parseCount)
    .option("--page-height <n>", "Debugger page height", parseCount)
    .action(async (programPath: string, args: string[], options: CliOptions) => {
      await runAutopsy(programPath, args, options);
    });

  program
    .command("check-tools")
    .description("Show where Valgrind, GDB and vgdb are found")
    .option("--valgrind <path>", "Valgrind executable")
    .option("--gdb <path>", "GDB executable")
    .option("--vgdb <path>", "vgdb executable")
    .action(async (options: Pick<CliOptions, "valgrind" | "gdb" | "vgdb">) => {
      const ok = await checkTools(options);
      if (!ok) {
        process.exitCode = 1;
      }
    });

  return program;
}

/**
 * Turn parsed command-line options into a validated session config
 */
export function buildConfig(programPath: string, args: string[], options: CliOptions): SessionConfig {
  return resolveConfig({
    program: programPath,
    programArgs: args,
    firstError: options.firstError,
    timeoutMs: options.timeout,
    setupCommands: options.ex,
    interactive: options.interactive,
    verbosity: Math.min(options.verbose, 3),
    outputs: options.output.length > 0 ? options.output : undefined,
    valgrindPath: options.valgrind,
    gdbPath: options.gdb,
    vgdbPath: options.vgdb,
    toolArgs: options.toolArg,
    maxFrames: options.maxFrames,
    pageHeight: options.pageHeight,
  });
}

async function runAutopsy(programPath: string, args: string[], options: CliOptions): Promise<void> {
  const streams: NodeJS.WritableStream[] = [];
  try {
    const config = buildConfig(programPath, args, options);
    logger.setVerbosity(Math.max(config.verbosity, logger.getVerbosity()));

    openOutputs(config.outputs, streams);

    const session = new AutopsySession(config, {
      formatter: new ReportFormatter({ streams }),
    });
    await session.run();
  } catch (error) {
    if (error instanceof AutopsyError) {
      console.error(`error: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    await closeStreams(streams);
  }
}

/**
 * Open each output into `streams`. Streams opened before a failure stay there.
 */
export function openOutputs(outputs: string[], streams: NodeJS.WritableStream[]): void {
  for (const output of outputs) {
    streams.push(openOutput(output));
  }
}

function openOutput(output: string): NodeJS.WritableStream {
  if (output === "-") {
    return process.stdout;
  }

  let fd: number;
  try {
    fd = fs.openSync(output, "w");
  } catch (error) {
    throw new ConfigError([`outputs: cannot open ${output}: ${error instanceof Error ? error.message : String(error)}`]);
  }
  return fs.createWriteStream(output, { fd });
}

export async function closeStreams(streams: NodeJS.WritableStream[]): Promise<void> {
  for (const stream of streams) {
    if (stream instanceof fs.WriteStream && !stream.closed) {
      stream.end();
      await once(stream, "close");
    }
  }
}

async function checkTools(options: Pick<CliOptions, "valgrind" | "gdb" | "vgdb">): Promise<boolean> {
  const found = await detectTools({
    valgrind: options.valgrind,
    gdb: options.gdb,
    vgdb: options.vgdb,
  });

  let allFound = true;
  for (const id of getToolIds()) {
    const tool = getTool(id);
    if (!tool) continue;

    const path = found.get(id);
    console.log(`  ${tool.name}`);
    if (path) {
      console.log(`    Status: found (${path})`);
    } else {
      allFound = false;
      console.log("    Status: not found");
      console.log(tool.installHint.replace(/^/gm, "    "));
    }
    console.log();
  }

  return allFound;
}
