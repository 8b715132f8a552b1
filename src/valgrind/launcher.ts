/**
 * Analyzer Launcher
 *
 * Starts the program under Valgrind with stderr piped into a LineReader,
 * and kills it when the session is over.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { valgrindTool } from '../adapters/valgrind.js';
import type { SessionConfig } from '../session/config.js';
import { LineReader } from '../util/line-reader.js';
import { logger } from '../util/logger.js';

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export interface AnalyzerProcess {
  process: ChildProcess;
  /** Valgrind diagnostics, one line per item */
  diagnostics: LineReader;
}

export function launchAnalyzer(config: SessionConfig, spawnProcess: SpawnFunction = spawn): AnalyzerProcess {
  const args = valgrindTool.buildArgs({
    program: config.program,
    programArgs: config.programArgs,
    firstError: config.firstError,
    toolArgs: config.toolArgs,
  });

  logger.info(`Command: ${config.valgrindPath} ${args.join(' ')}`);

  // The program keeps the terminal; only Valgrind's own channel is captured
  const analyzer = spawnProcess(config.valgrindPath, args, {
    stdio: [config.interactive ? 'ignore' : 'inherit', 'inherit', 'pipe'],
  });

  if (!analyzer.stderr) {
    throw new Error('Analyzer process has no stderr pipe');
  }

  return {
    process: analyzer,
    diagnostics: new LineReader(analyzer.stderr, { maxBufferedLines: config.maxBufferedLines }),
  };
}

/**
 * Kill the analyzed program. Called once the diagnostic stream has ended
 * or the session is aborting.
 */
export function cleanupAnalyzer(analyzer: ChildProcess): void {
  try {
    analyzer.kill('SIGKILL');
  } catch (error) {
    logger.debug(
      'Could not kill analyzer',
      error instanceof Error ? error.message : String(error)
    );
  }
}
