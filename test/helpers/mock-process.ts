/**
 * Mock child processes for transport and session tests
 */

import { vi, type Mock } from 'vitest';
import { EventEmitter } from 'node:events';
import type { ChildProcess } from 'node:child_process';

export interface MockProcess {
  process: ChildProcess;
  stdin: EventEmitter & { write: Mock; writable: boolean };
  stdout: EventEmitter;
  stderr: EventEmitter;
  kill: Mock;
  emit: (event: string, ...args: unknown[]) => boolean;
}

// Create a mock ChildProcess with the necessary streams
export function createMockProcess(pid: number = 4242): MockProcess {
  const stdin = Object.assign(new EventEmitter(), { write: vi.fn(), writable: true });
  const stdout = new EventEmitter();
  const stderr = new EventEmitter();
  const processEmitter = new EventEmitter();
  const kill = vi.fn();

  const mockProcess = {
    stdin,
    stdout,
    stderr,
    on: processEmitter.on.bind(processEmitter),
    once: processEmitter.once.bind(processEmitter),
    emit: processEmitter.emit.bind(processEmitter),
    kill,
    pid,
  } as unknown as ChildProcess;

  return {
    process: mockProcess,
    stdin,
    stdout,
    stderr,
    kill,
    emit: processEmitter.emit.bind(processEmitter),
  };
}

/**
 * Reply to each command written to stdin with `respond(command)`, emitted
 * on stdout before write returns. "quit" closes stdout. A null reply
 * leaves the command unanswered.
 */
export function scriptDebugger(mock: MockProcess, respond: (command: string) => string | null): string[] {
  const commands: string[] = [];

  mock.stdin.write.mockImplementation((data: string) => {
    const command = data.replace(/\n$/, '');
    commands.push(command);

    if (command === 'quit') {
      mock.stdout.emit('end');
      mock.emit('exit', 0, null);
      return true;
    }

    const reply = respond(command);
    if (reply !== null) {
      mock.stdout.emit('data', reply);
    }
    return true;
  });

  return commands;
}

/**
 * Print the startup prompt once the transport is listening
 */
export function greet(mock: MockProcess, prompt: string = '(gdb) '): void {
  setImmediate(() => mock.stdout.emit('data', prompt));
}
