/**
 * Autopsy Session Controller
 *
 * Orchestrates one run of the program under the analyzer:
 * - Launches Valgrind and watches its diagnostics for the attach trigger
 * - Parses the error that stopped the program
 * - Launches GDB and attaches it through vgdb
 * - Walks the stack, deduplicates and writes the report (or hands GDB to the user)
 * - Quits and kills GDB, letting the program continue
 * - Kills the program once its diagnostics end
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { gdbTool } from '../adapters/gdb.js';
import { FrameInspector } from '../gdb/frames.js';
import { GdbTransport } from '../gdb/transport.js';
import { ReportFormatter } from '../output/formatter.js';
import type { ErrorReport } from '../output/types.js';
import { END_OF_STREAM } from '../util/line-reader.js';
import { logger } from '../util/logger.js';
import { cleanupAnalyzer, launchAnalyzer, type AnalyzerProcess, type SpawnFunction } from '../valgrind/launcher.js';
import { ATTACH_TRIGGER, extractPid, parseErrorReports } from '../valgrind/parser.js';
import type { SessionConfig } from './config.js';
import { SignatureRegistry, stackSignature } from './dedup.js';
import { AttachError, LaunchError } from './errors.js';
import { runInteractive, TerminalInput } from './interactive.js';

/** Upper bound on waiting for GDB to exit after "quit" */
const QUIT_TIMEOUT_MS = 5000;

export type SessionState =
  | 'waiting_for_trigger'
  | 'debugging'
  | 'interactive'
  | 'autodebug'
  | 'teardown'
  | 'exited';

export interface SessionDependencies {
  /** Process factory for Valgrind and GDB (default: child_process.spawn) */
  spawnProcess?: SpawnFunction;
  formatter?: ReportFormatter;
  /** Terminal used by interactive mode */
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

export interface SessionSummary {
  /** Number of the last error the program stopped on */
  lastError: number;
  reportsEmitted: number;
  duplicatesSuppressed: number;
  /** Errors reported before the first one the program stopped on */
  errorsSkipped: number;
}

export class AutopsySession {
  private config: SessionConfig;
  private formatter: ReportFormatter;
  private spawnProcess: SpawnFunction;
  private input?: NodeJS.ReadableStream;
  private output?: NodeJS.WritableStream;
  private terminal: TerminalInput | null = null;
  private registry = new SignatureRegistry();

  private state: SessionState = 'waiting_for_trigger';
  private errorCount: number;
  private debuggerConnected: boolean = false;
  private analyzer: AnalyzerProcess | null = null;
  private analyzerError: Error | null = null;
  private analyzerKilled: boolean = false;
  private debugger: GdbTransport | null = null;
  private reportsEmitted: number = 0;
  private duplicatesSuppressed: number = 0;
  private errorsSkipped: number = 0;

  constructor(config: SessionConfig, dependencies: SessionDependencies = {}) {
    this.config = config;
    this.formatter = dependencies.formatter ?? new ReportFormatter();
    this.spawnProcess = dependencies.spawnProcess ?? spawn;
    this.input = dependencies.input;
    this.output = dependencies.output;
    this.errorCount = config.firstError - 1;
  }

  getState(): SessionState {
    return this.state;
  }

  isDebuggerConnected(): boolean {
    return this.debuggerConnected;
  }

  /**
   * Run until the analyzer's diagnostics end. Launch and attach failures
   * reject after the debugger and the program have been cleaned up.
   */
  async run(): Promise<SessionSummary> {
    try {
      this.analyzer = this.startAnalyzer();
      await this.monitor(this.analyzer);

      const summary: SessionSummary = {
        lastError: this.errorCount,
        reportsEmitted: this.reportsEmitted,
        duplicatesSuppressed: this.duplicatesSuppressed,
        errorsSkipped: this.errorsSkipped,
      };
      logger.info(
        `Program finished: ${summary.reportsEmitted} report(s), ` +
          `${summary.duplicatesSuppressed} duplicate(s) suppressed`
      );
      return summary;
    } finally {
      await this.teardown();
      this.stopAnalyzer();
      this.terminal?.close();
      this.terminal = null;
      this.state = 'exited';
    }
  }

  private startAnalyzer(): AnalyzerProcess {
    let analyzer: AnalyzerProcess;
    try {
      analyzer = launchAnalyzer(this.config, this.spawnProcess);
    } catch (error) {
      throw new LaunchError(
        `Cannot start ${this.config.valgrindPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    analyzer.process.on('error', (error: Error) => {
      this.analyzerError = error;
    });
    return analyzer;
  }

  /**
   * WAITING_FOR_TRIGGER: gather diagnostic lines into a block until Valgrind
   * announces it has stopped, then debug that block's error.
   */
  private async monitor(analyzer: AnalyzerProcess): Promise<void> {
    const diagnostics = analyzer.diagnostics;
    let block: string[] = [];

    while (true) {
      this.checkAnalyzerStarted();

      const item = diagnostics.next();
      if (item === undefined) {
        await diagnostics.waitForActivity(this.config.pollIntervalMs, false);
        continue;
      }

      if (item === END_OF_STREAM) {
        this.checkAnalyzerStarted();
        if (diagnostics.dropped > 0) {
          logger.warn(`${diagnostics.dropped} diagnostic line(s) were dropped while the session was busy`);
        }
        logger.info('Analyzer diagnostics ended');
        return;
      }

      logger.debug(item);
      block.push(item);

      if (item.includes(ATTACH_TRIGGER)) {
        await this.handleTrigger(block, item);
        block = [];
        this.state = 'waiting_for_trigger';
      }
    }
  }

  private checkAnalyzerStarted(): void {
    if (this.analyzerError) {
      throw new LaunchError(`Cannot start ${this.config.valgrindPath}: ${this.analyzerError.message}`);
    }
  }

  /**
   * DEBUGGING: the block ends with the trigger. Errors before the last one
   * were shown without stopping (they precede the first error to debug).
   */
  private async handleTrigger(block: string[], triggerLine: string): Promise<void> {
    this.state = 'debugging';
    this.errorCount++;

    const reports = parseErrorReports(block);
    for (const skipped of reports.slice(0, -1)) {
      this.errorsSkipped++;
      logger.debug(`Skipping error before #${this.config.firstError}: ${skipped.message}`);
    }

    const report: ErrorReport = reports[reports.length - 1] ?? { message: 'unrecognized error', stack: [] };
    const pid = extractPid(triggerLine) ?? report.pid ?? this.analyzer?.process.pid;
    if (pid === undefined) {
      throw new AttachError('No process id to attach the debugger to');
    }

    logger.info(`Error ${this.errorCount}: ${report.message}`);

    try {
      const channel = await this.connectDebugger(pid);
      if (this.config.interactive) {
        this.state = 'interactive';
        if (!this.terminal) {
          this.terminal = new TerminalInput(this.input);
        }
        await runInteractive(channel, {
          terminal: this.terminal,
          output: this.output,
          banner:
            `error ${this.errorCount}: ${report.message}\n` +
            `GDB is attached to process ${pid}; "quit" lets the program continue.`,
        });
      } else {
        this.state = 'autodebug';
        await this.autodebug(channel, report);
      }
    } finally {
      // Policy: one debugger per error, torn down even when it could be reused
      await this.teardown();
    }
  }

  /**
   * Launch GDB (or reuse a live one), run setup and attach through vgdb
   */
  private async connectDebugger(pid: number): Promise<GdbTransport> {
    if (this.debugger && this.debuggerConnected && this.debugger.isConnected()) {
      return this.debugger;
    }

    const { gdbPath, timeoutMs } = this.config;
    let child: ChildProcess;
    try {
      child = this.spawnProcess(gdbPath, gdbTool.buildArgs(this.config.program), {
        stdio: ['pipe', 'pipe', 'pipe'],
      });
    } catch (error) {
      throw new LaunchError(
        `Cannot start ${gdbPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    const transport = new GdbTransport(child, {
      timeout: timeoutMs,
      prompt: gdbTool.prompt,
      pagerMarkers: gdbTool.pagerMarkers,
      pagerQuitCommand: gdbTool.pagerQuitCommand,
    });
    this.debugger = transport;

    const banner = await transport.waitForPrompt();
    const processError = transport.getProcessError();
    if (processError) {
      throw new LaunchError(`Cannot start ${gdbPath}: ${processError.message}`);
    }
    if (banner.length === 0 || !transport.isConnected()) {
      throw new LaunchError(`${gdbPath} showed no prompt within ${timeoutMs}ms`);
    }

    for (const command of [...gdbTool.setupCommands(this.config.pageHeight), ...this.config.setupCommands]) {
      await transport.sendAndWait(command);
    }

    const attachCommand = gdbTool.attachCommand(pid, this.config.vgdbPath);
    const attached = await transport.sendAndWait(attachCommand);
    if (attached.length === 0) {
      throw new AttachError(`No response to "${attachCommand}" within ${timeoutMs}ms`);
    }

    this.debuggerConnected = true;
    logger.info(`Debugger attached to process ${pid}`);
    return transport;
  }

  /**
   * AUTODEBUG: walk the stack and write the report unless it is a repeat
   */
  private async autodebug(channel: GdbTransport, report: ErrorReport): Promise<void> {
    const inspector = new FrameInspector(channel, {
      maxFrames: this.config.maxFrames,
      valueWidth: this.config.valueWidth,
      prompt: gdbTool.prompt,
    });

    const frames = await inspector.walkStack();
    if (frames.length === 0) {
      logger.warn(`No frames could be read for error ${this.errorCount}`);
    }

    if (!this.registry.claim(stackSignature(frames))) {
      this.duplicatesSuppressed++;
      logger.debug(`Error ${this.errorCount} repeats an earlier report; not reported again`);
      return;
    }

    this.formatter.emitReport(this.errorCount, report, frames);
    this.reportsEmitted++;
  }

  /**
   * TEARDOWN: ask GDB to quit, then kill it whatever the answer
   */
  private async teardown(): Promise<void> {
    const transport = this.debugger;
    if (!transport) return;

    this.state = 'teardown';
    try {
      if (transport.isConnected()) {
        await transport.sendAndWait(gdbTool.quitCommand, Math.min(this.config.timeoutMs, QUIT_TIMEOUT_MS));
      }
    } finally {
      transport.close();
      this.debugger = null;
      this.debuggerConnected = false;
    }
  }

  private stopAnalyzer(): void {
    if (!this.analyzer || this.analyzerKilled) return;
    this.analyzerKilled = true;
    cleanupAnalyzer(this.analyzer.process);
  }
}
