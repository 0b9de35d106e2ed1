/**
 * Structured logging for the patrol client
 *
 * - Levels DEBUG, INFO, WARN, ERROR, FATAL with a configurable floor
 * - Colored console lines
 * - JSON lines in a daily file; a file over the size cap is moved aside and
 *   only the newest `maxFiles` files are kept
 * - Named loggers per module, resolved against the root configured through
 *   `initializeLogger`
 */

import * as fs from 'fs';
import * as path from 'path';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LoggerConfig {
  logDir: string;
  maxFileSizeMB: number;
  maxFiles: number;
  minLevel: LogLevel;
  consoleOutput: boolean;
  fileOutput: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFileSizeMB: 10,
  maxFiles: 5,
  minLevel: 'INFO',
  consoleOutput: true,
  fileOutput: true,
};

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  DEBUG: '\x1b[90m',
  INFO: '\x1b[36m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
};

const LOG_FILE_PREFIX = 'patrol-client-';

export interface LogSink {
  write(entry: LogEntry): void;
}

export function formatConsoleLine(entry: LogEntry, color = true): string {
  const [open, close] = color ? [LEVEL_COLORS[entry.level], '\x1b[0m'] : ['', ''];
  let line = `${open}[${entry.timestamp}] [${entry.level}] [${entry.service}]${close} ${entry.message}`;
  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
    if (entry.error.stack) {
      line += `\n  ${entry.error.stack.split('\n').slice(1, 4).join('\n  ')}`;
    }
  }
  return line;
}

class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const line = formatConsoleLine(entry);
    if (LEVEL_PRIORITY[entry.level] >= LEVEL_PRIORITY.ERROR) {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

/** Appends JSON lines to `<prefix><date>.log` under `logDir`. */
export class RotatingFileSink implements LogSink {
  private readonly maxBytes: number;

  constructor(
    private readonly logDir: string,
    maxFileSizeMB: number,
    private readonly maxFiles: number
  ) {
    this.maxBytes = maxFileSizeMB * 1024 * 1024;
    fs.mkdirSync(logDir, { recursive: true });
  }

  currentFile(date = new Date()): string {
    return path.join(this.logDir, `${LOG_FILE_PREFIX}${date.toISOString().slice(0, 10)}.log`);
  }

  write(entry: LogEntry): void {
    const file = this.currentFile(new Date(entry.timestamp));
    try {
      if (fs.existsSync(file) && fs.statSync(file).size >= this.maxBytes) {
        fs.renameSync(file, file.replace(/\.log$/, `.${Date.now()}.log`));
        this.prune();
      }
      fs.appendFileSync(file, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error('Failed to write log:', error);
    }
  }

  /** Deletes all but the newest `maxFiles` log files. */
  prune(): void {
    const files = fs.readdirSync(this.logDir)
      .filter(f => f.startsWith(LOG_FILE_PREFIX) && f.endsWith('.log'))
      .map(f => {
        const full = path.join(this.logDir, f);
        return { path: full, mtimeMs: fs.statSync(full).mtimeMs };
      })
      .sort((a, b) => b.mtimeMs - a.mtimeMs);

    for (const stale of files.slice(this.maxFiles)) {
      fs.unlinkSync(stale.path);
    }
  }
}

export class Logger {
  constructor(
    private readonly serviceName: string,
    private readonly minLevel: LogLevel,
    private readonly sinks: LogSink[]
  ) {}

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.minLevel];
  }

  protected log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    if (!this.isLevelEnabled(level) || this.sinks.length === 0) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service: this.serviceName,
      message,
      context,
    };
    if (error) {
      entry.error = { name: error.name, message: error.message, stack: error.stack };
    }

    for (const sink of this.sinks) {
      sink.write(entry);
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('WARN', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('ERROR', message, context, error);
  }

  fatal(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('FATAL', message, context, error);
  }

  child(childService: string): Logger {
    return new Logger(`${this.serviceName}:${childService}`, this.minLevel, this.sinks);
  }
}

const ROOT_SERVICE = 'PatrolClient';

function createRootLogger(config: Partial<LoggerConfig>): Logger {
  const full = { ...DEFAULT_CONFIG, ...config };
  const sinks: LogSink[] = [];
  if (full.consoleOutput) sinks.push(new ConsoleSink());
  if (full.fileOutput) sinks.push(new RotatingFileSink(full.logDir, full.maxFileSizeMB, full.maxFiles));
  return new Logger(ROOT_SERVICE, full.minLevel, sinks);
}

let root: Logger | null = null;
let generation = 0;

function rootLogger(): Logger {
  if (!root) {
    root = createRootLogger({});
  }
  return root;
}

/**
 * Module-level loggers are created at import time, before the CLI has read
 * its configuration; each call resolves against the current root.
 */
class DeferredLogger extends Logger {
  private resolved: Logger | null = null;
  private resolvedFor = -1;

  constructor(private readonly name: string) {
    super(name, 'FATAL', []);
  }

  private target(): Logger {
    if (!this.resolved || this.resolvedFor !== generation) {
      this.resolved = rootLogger().child(this.name);
      this.resolvedFor = generation;
    }
    return this.resolved;
  }

  override isLevelEnabled(level: LogLevel): boolean {
    return this.target().isLevelEnabled(level);
  }

  protected override log(level: LogLevel, message: string, context?: Record<string, unknown>, error?: Error): void {
    switch (level) {
      case 'DEBUG': return this.target().debug(message, context);
      case 'INFO': return this.target().info(message, context);
      case 'WARN': return this.target().warn(message, context);
      case 'ERROR': return this.target().error(message, error, context);
      case 'FATAL': return this.target().fatal(message, error, context);
    }
  }

  override child(childService: string): Logger {
    return this.target().child(childService);
  }
}

export function getLogger(serviceName: string = ROOT_SERVICE): Logger {
  if (serviceName === ROOT_SERVICE) {
    return rootLogger();
  }
  return new DeferredLogger(serviceName);
}

export function initializeLogger(config: Partial<LoggerConfig>): Logger {
  root = createRootLogger(config);
  generation++;
  return root;
}
