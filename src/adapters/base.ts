/**
 * Base Tool Interface
 *
 * Defines the contract for the external programs the session drives.
 */

export interface ToolConfig {
  /** Short identifier (e.g., "valgrind", "gdb") */
  id: string;

  /** Human-readable name */
  name: string;

  /** Default command, overridable from the session config */
  command: string;

  /** Function to detect if the tool is installed */
  detect: (command?: string) => Promise<string | null>;

  /** Instructions for installing the tool */
  installHint: string;
}

export interface AnalyzerLaunchOptions {
  program: string;
  programArgs: string[];
  /** Number of the first error that stops the program for the debugger */
  firstError: number;
  /** Extra tool arguments placed before the program */
  toolArgs: string[];
}

export interface AnalyzerTool extends ToolConfig {
  buildArgs: (options: AnalyzerLaunchOptions) => string[];
}

export interface DebuggerTool extends ToolConfig {
  /** Text printed when the debugger is ready for the next command */
  prompt: string;

  /** Substrings identifying a pagination prompt */
  pagerMarkers: string[];

  /** Answer to a pagination prompt */
  pagerQuitCommand: string;

  /** Command that ends the debugger */
  quitCommand: string;

  buildArgs: (program: string) => string[];

  /** Session setup sent before attaching */
  setupCommands: (pageHeight: number) => string[];

  /** Command connecting to the stopped analyzer */
  attachCommand: (pid: number, relayCommand: string) => string;
}

/**
 * Check if a command exists in PATH
 */
export async function commandExists(command: string): Promise<string | null> {
  const { exec } = await import('node:child_process');
  const { promisify } = await import('node:util');
  const execAsync = promisify(exec);

  try {
    const cmd = process.platform === 'win32' ? `where ${command}` : `which ${command}`;
    const { stdout } = await execAsync(cmd);
    return stdout.trim().split('\n')[0] || null;
  } catch {
    return null;
  }
}
