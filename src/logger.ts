/**
 * Registry Logger - component-tagged console logging
 * Levels, ANSI colors, progress bars, summary boxes and an optional session file
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  data?: unknown;
}

// ANSI colors for terminal output
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
};

const LEVEL_COLORS: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: COLORS.dim,
  [LogLevel.INFO]: COLORS.green,
  [LogLevel.WARN]: COLORS.yellow,
  [LogLevel.ERROR]: COLORS.red,
};

const LEVEL_NAMES: Record<Exclude<LogLevel, LogLevel.SILENT>, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

const LEVELS_BY_NAME = new Map<string, LogLevel>([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
  ['silent', LogLevel.SILENT],
]);

export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVELS_BY_NAME.get(name.trim().toLowerCase());
}

class Logger {
  private minLevel: LogLevel;
  private logFile: string | null = null;
  private logBuffer: LogEntry[] = [];

  constructor() {
    this.minLevel = process.env.REGISTRY_DEBUG === 'true' ? LogLevel.DEBUG : LogLevel.INFO;
  }

  setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  /**
   * Start a new log session with a timestamped file under logDir.
   * Entries are buffered until flush().
   */
  startSession(logDir: string, name: string = 'registry') {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(logDir, `${name}-${timestamp}.log`);
    this.logBuffer = [];
    this.info('Logger', `Session started: ${this.logFile}`);
  }

  private formatTime(): string {
    return new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
  }

  private log(level: Exclude<LogLevel, LogLevel.SILENT>, component: string, message: string, data?: unknown) {
    if (level < this.minLevel) return;

    const timestamp = this.formatTime();
    const levelName = LEVEL_NAMES[level];
    const color = LEVEL_COLORS[level];

    const prefix = `${COLORS.dim}${timestamp}${COLORS.reset} ${color}${levelName.padEnd(5)}${COLORS.reset}`;
    const componentStr = `${COLORS.cyan}[${component}]${COLORS.reset}`;

    const line = `${prefix} ${componentStr} ${message}`;
    if (level >= LogLevel.WARN) {
      console.error(line);
    } else {
      console.log(line);
    }

    if (data !== undefined && this.minLevel === LogLevel.DEBUG) {
      console.log(`${COLORS.dim}  └─ ${JSON.stringify(data, null, 2).split('\n').join('\n     ')}${COLORS.reset}`);
    }

    if (this.logFile) {
      this.logBuffer.push({ timestamp, level: levelName, component, message, data });
    }
  }

  debug(component: string, message: string, data?: unknown) {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown) {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown) {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: unknown) {
    this.log(LogLevel.ERROR, component, message, data);
  }

  /**
   * Log progress for batch operations
   */
  progress(component: string, current: number, total: number, item: string) {
    if (this.minLevel > LogLevel.INFO) return;
    const pct = total > 0 ? Math.round((current / total) * 100) : 100;
    const bar = '█'.repeat(Math.floor(pct / 5)) + '░'.repeat(20 - Math.floor(pct / 5));
    console.log(`${COLORS.dim}${this.formatTime()}${COLORS.reset} ${COLORS.blue}${bar}${COLORS.reset} ${current}/${total} ${COLORS.cyan}[${component}]${COLORS.reset} ${item}`);
  }

  /**
   * Log a summary table
   */
  summary(title: string, data: Record<string, number | string>) {
    if (this.minLevel > LogLevel.INFO) return;
    console.log(`\n${COLORS.cyan}╭${'─'.repeat(48)}╮${COLORS.reset}`);
    console.log(`${COLORS.cyan}│${COLORS.reset} ${COLORS.green}${title.padEnd(47)}${COLORS.reset}${COLORS.cyan}│${COLORS.reset}`);
    console.log(`${COLORS.cyan}├${'─'.repeat(48)}┤${COLORS.reset}`);

    for (const [key, value] of Object.entries(data)) {
      const valueStr = typeof value === 'number' ? value.toLocaleString() : value;
      console.log(`${COLORS.cyan}│${COLORS.reset}  ${key.padEnd(25)} ${String(valueStr).padStart(20)} ${COLORS.cyan}│${COLORS.reset}`);
    }

    console.log(`${COLORS.cyan}╰${'─'.repeat(48)}╯${COLORS.reset}\n`);
  }

  /**
   * Flush log buffer to file
   */
  flush() {
    if (this.logFile && this.logBuffer.length > 0) {
      const content = this.logBuffer.map(entry =>
        `${entry.timestamp} [${entry.level}] [${entry.component}] ${entry.message}${entry.data !== undefined ? ' ' + JSON.stringify(entry.data) : ''}`
      ).join('\n');
      fs.appendFileSync(this.logFile, content + '\n');
      this.logBuffer = [];
    }
  }
}

// Singleton instance
export const logger = new Logger();
