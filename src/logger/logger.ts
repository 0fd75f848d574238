import { join } from 'node:path';
import { type FileHandle, open } from 'node:fs/promises';
import { ensureDir } from 'fs-extra/esm';

export interface CommandLogEntry {
  command: string;
  args: string[];
  startTime: Date;
  endTime?: Date;
  duration?: number;
  success: boolean;
  stdout?: string | undefined;
  stderr?: string | undefined;
  exitCode?: number | undefined;
}

const DEFAULT_LOG_DIR = './logs';

export class Logger {
  private static instance: Logger | undefined;
  private readonly logDir: string;
  private logFile?: FileHandle;
  private commandLogFile?: FileHandle;

  private constructor(logDir: string) {
    this.logDir = logDir;
  }

  /**
   * Opens the shared logger, or returns the one already open. Asking for a
   * different directory closes the open logger and starts a new one there.
   */
  static async getInstance(logDir?: string): Promise<Logger> {
    if (Logger.instance && logDir !== undefined && Logger.instance.logDir !== logDir) {
      await Logger.instance.close();
    }
    if (!Logger.instance) {
      Logger.instance = new Logger(logDir ?? DEFAULT_LOG_DIR);
      await Logger.instance.initialize();
    }
    return Logger.instance;
  }

  /** The shared logger if one is open. Never creates log files. */
  static current(): Logger | undefined {
    return Logger.instance;
  }

  get directory(): string {
    return this.logDir;
  }

  private async initialize(): Promise<void> {
    await ensureDir(this.logDir);

    this.logFile = await open(join(this.logDir, 'bindery.log'), 'a');
    this.commandLogFile = await open(join(this.logDir, 'commands.log'), 'a');
  }

  async close(): Promise<void> {
    await this.logFile?.close();
    await this.commandLogFile?.close();
    this.logFile = undefined;
    this.commandLogFile = undefined;
    if (Logger.instance === this) {
      Logger.instance = undefined;
    }
  }

  private async writeToFile(file: FileHandle | undefined, message: string): Promise<void> {
    if (file) {
      const timestamp = new Date().toISOString();
      await file.write(`${timestamp} | ${message}\n`);
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    const logMessage = meta ? `INFO: ${message} ${JSON.stringify(meta)}` : `INFO: ${message}`;
    this.writeToFile(this.logFile, logMessage).catch(console.error);
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    const errorInfo = error instanceof Error ? { error: error.message, stack: error.stack } : { error: String(error) };

    const logMessage = `ERROR: ${message} ${JSON.stringify({ ...errorInfo, ...meta })}`;
    this.writeToFile(this.logFile, logMessage).catch(console.error);
  }

  logCommandStart(command: string, args: string[]): CommandLogEntry {
    const entry: CommandLogEntry = {
      command,
      args,
      startTime: new Date(),
      success: false,
    };

    this.writeToFile(this.commandLogFile, `COMMAND_START: ${command} ${args.join(' ')}`).catch(console.error);

    return entry;
  }

  logCommandEnd(
    entry: CommandLogEntry,
    success: boolean,
    stdout?: string | undefined,
    stderr?: string | undefined,
    exitCode?: number | undefined,
  ): void {
    entry.endTime = new Date();
    entry.duration = entry.endTime.getTime() - entry.startTime.getTime();
    entry.success = success;
    entry.stdout = stdout;
    entry.stderr = stderr;
    entry.exitCode = exitCode;

    const status = success ? 'SUCCESS' : 'FAILED';

    this.writeToFile(this.commandLogFile, `COMMAND_END: ${entry.command} - ${status} (${entry.duration}ms)`).catch(console.error);

    if (stdout && stdout.length > 0) {
      this.writeToFile(
        this.commandLogFile,
        `STDOUT: ${stdout.slice(0, 1000)}${stdout.length > 1000 ? '...' : ''}`,
      ).catch(console.error);
    }

    if (stderr && stderr.length > 0) {
      this.writeToFile(
        this.commandLogFile,
        `STDERR: ${stderr.slice(0, 1000)}${stderr.length > 1000 ? '...' : ''}`,
      ).catch(console.error);
    }

    if (exitCode !== undefined) {
      this.writeToFile(this.commandLogFile, `EXIT_CODE: ${exitCode}`).catch(console.error);
    }
  }
}
