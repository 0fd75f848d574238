import { spawn } from 'node:child_process';
import { Logger } from '../logger/mod.js';

export interface CommandOptions {
  timeout?: number | undefined;
  /** Receives the command log. Falls back to the shared logger when one is open. */
  logger?: Logger | undefined;
}

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  duration: number;
}

interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export async function executeCommand(
  command: string,
  args: string[] = [],
  options: CommandOptions = {},
): Promise<CommandResult> {
  const logger = options.logger ?? Logger.current();
  const logEntry = logger?.logCommandStart(command, args);
  const startTime = Date.now();

  try {
    const output = await runProcess(command, args, options);
    const success = output.exitCode === 0;

    if (logEntry) {
      logger?.logCommandEnd(logEntry, success, output.stdout, output.stderr, output.exitCode);
    }

    return {
      success,
      stdout: output.stdout,
      stderr: output.stderr,
      exitCode: output.exitCode,
      duration: Date.now() - startTime,
    };
  } catch (error) {
    if (logEntry) {
      logger?.logCommandEnd(logEntry, false, undefined, String(error));
    }
    logger?.error(`Command execution failed: ${command}`, error);

    return {
      success: false,
      stdout: '',
      stderr: String(error),
      exitCode: -1,
      duration: Date.now() - startTime,
    };
  }
}

function runProcess(command: string, args: string[], options: CommandOptions): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    // Handle timeout
    let timeoutId: NodeJS.Timeout | undefined;
    if (options.timeout) {
      timeoutId = setTimeout(() => {
        child.kill('SIGTERM');
      }, options.timeout);
    }

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error) => {
      if (timeoutId) clearTimeout(timeoutId);
      reject(error);
    });

    child.on('close', (code, signal) => {
      if (timeoutId) clearTimeout(timeoutId);
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8') + (signal ? `\nKilled by ${signal}` : ''),
        exitCode: code ?? -1,
      });
    });
  });
}
