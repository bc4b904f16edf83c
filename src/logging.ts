/**
 * Logging Utility
 *
 * Diagnostics go to stderr so they never mix with data output. Once an MCP
 * server is attached, messages are sent as MCP logging notifications instead.
 */

import type { Server } from '@modelcontextprotocol/sdk/server/index.js';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warning: 2,
  error: 3
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Read minimum level from PR_COMMENTS_LOG_LEVEL, defaulting to info
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env.PR_COMMENTS_LOG_LEVEL?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : 'info';
}

export class MCPLogger {
  private server: Server | null = null;
  private readonly loggerName: string;
  private minLevel: LogLevel;

  constructor(loggerName: string = 'pr-comment-collector', minLevel: LogLevel = getLogLevel()) {
    this.loggerName = loggerName;
    this.minLevel = minLevel;
  }

  /**
   * Attach an MCP server; must be called after the server is created
   */
  initialize(server: Server): void {
    this.server = server;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  log(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;

    if (!this.server) {
      this.writeStderr(level, message, data);
      return;
    }

    this.server
      .sendLoggingMessage({
        level,
        logger: this.loggerName,
        data: data !== undefined ? `${message}: ${JSON.stringify(data)}` : message
      })
      .catch((error: unknown) => {
        // Fall back to stderr if MCP logging fails
        this.writeStderr(level, message, data);
        console.error(`[MCP LOG FAIL] Reason: ${error instanceof Error ? error.message : String(error)}`);
      });
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warning(message: string, data?: unknown): void {
    this.log('warning', message, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', message, data);
  }

  private writeStderr(level: LogLevel, message: string, data?: unknown): void {
    const line = `[${level.toUpperCase()}] ${message}`;
    if (data === undefined) {
      console.error(line);
    } else {
      console.error(line, data);
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new MCPLogger('pr-comment-collector');
