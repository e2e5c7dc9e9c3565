/**
 * Debug logging for the formula engine.
 * Controlled by environment variables:
 * - DEBUG_PROPLOGIC=true to enable debug logging
 * - DEBUG_PROPLOGIC_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - DEBUG_PROPLOGIC_FILTER=SIMPLIFY,NORMAL_FORM,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  PARSER = 'PARSER',
  EVALUATE = 'EVALUATE',
  SIMPLIFY = 'SIMPLIFY',
  NORMAL_FORM = 'NORMAL_FORM',
  DECIDE = 'DECIDE',
  TRUTH_TABLE = 'TRUTH_TABLE',
  CLI = 'CLI',
}

/**
 * A message, or a thunk producing it. Thunks are only called when the message
 * will actually be written, so callers can defer rendering formulas.
 */
export type LogMessage = string | (() => string);

function parseLevel(levelStr: string | undefined): LogLevel {
  switch (levelStr?.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'INFO':
      return LogLevel.INFO;
    default:
      return LogLevel.DEBUG;
  }
}

export class DebugLogger {
  private enabled: boolean;
  private level: LogLevel;
  private componentFilter: Set<string> | null;

  constructor(
    env: NodeJS.ProcessEnv = process.env,
    private readonly sink: (line: string) => void = (line) => console.log(line)
  ) {
    this.enabled = env.DEBUG_PROPLOGIC === 'true';
    this.level = parseLevel(env.DEBUG_PROPLOGIC_LEVEL);

    // Parse component filter
    const filterStr = env.DEBUG_PROPLOGIC_FILTER;
    if (filterStr) {
      this.componentFilter = new Set(filterStr.split(',').map((s) => s.trim()));
    } else {
      this.componentFilter = null; // null means log all components
    }
  }

  shouldLog(level: LogLevel, component: LogComponent): boolean {
    if (!this.enabled) return false;
    if (level < this.level) return false;
    if (this.componentFilter && !this.componentFilter.has(component))
      return false;
    return true;
  }

  private formatMessage(
    level: LogLevel,
    component: LogComponent,
    message: string
  ): string {
    const timestamp = new Date().toISOString();
    const levelStr = LogLevel[level];
    return `[${timestamp}] [${levelStr}] [${component}] ${message}`;
  }

  private log(level: LogLevel, component: LogComponent, message: LogMessage): void {
    if (!this.shouldLog(level, component)) return;
    const text = typeof message === 'function' ? message() : message;
    this.sink(this.formatMessage(level, component, text));
  }

  trace(component: LogComponent, message: LogMessage): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: LogMessage): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: LogMessage): void {
    this.log(LogLevel.INFO, component, message);
  }
}

// Singleton instance
export const debugLogger = new DebugLogger();
