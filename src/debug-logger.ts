/**
 * Debug logging for the elective equation engine.
 * Controlled by environment variables:
 * - DEBUG_ELECTIVE=true to enable debug logging
 * - DEBUG_ELECTIVE_LEVEL=TRACE|DEBUG|INFO (default: DEBUG)
 * - DEBUG_ELECTIVE_FILTER=NORMALIZER,ELIMINATION,... (comma-separated components)
 */

export enum LogLevel {
  TRACE = 0,
  DEBUG = 1,
  INFO = 2,
}

export enum LogComponent {
  PARSER = 'PARSER',
  NORMALIZER = 'NORMALIZER',
  CONJUNCTION = 'CONJUNCTION',
  ELIMINATION = 'ELIMINATION',
  SYLLOGISM = 'SYLLOGISM',
}

const LEVELS_BY_NAME: ReadonlyMap<string, LogLevel> = new Map([
  ['TRACE', LogLevel.TRACE],
  ['DEBUG', LogLevel.DEBUG],
  ['INFO', LogLevel.INFO],
]);

/** Logger settings, normally taken from the environment. */
export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
  /** Components to log, or null for all of them. */
  components: Set<string> | null;
}

/**
 * Reads logger settings from environment variables.
 */
export function loggerConfigFromEnv(env: NodeJS.ProcessEnv): LoggerConfig {
  const levelStr = env.DEBUG_ELECTIVE_LEVEL || 'DEBUG';
  const level = LEVELS_BY_NAME.get(levelStr) ?? LogLevel.DEBUG;

  const filterStr = env.DEBUG_ELECTIVE_FILTER;
  return {
    enabled: env.DEBUG_ELECTIVE === 'true',
    level,
    components: filterStr
      ? new Set(filterStr.split(',').map((s) => s.trim()))
      : null,
  };
}

export class DebugLogger {
  constructor(
    private readonly cfg: LoggerConfig,
    private readonly sink: (line: string) => void = console.log
  ) {}

  isEnabled(level: LogLevel, component: LogComponent): boolean {
    if (!this.cfg.enabled) return false;
    if (level < this.cfg.level) return false;
    if (this.cfg.components && !this.cfg.components.has(component))
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

  trace(component: LogComponent, message: string): void {
    this.log(LogLevel.TRACE, component, message);
  }

  debug(component: LogComponent, message: string): void {
    this.log(LogLevel.DEBUG, component, message);
  }

  info(component: LogComponent, message: string): void {
    this.log(LogLevel.INFO, component, message);
  }

  // renderFn only runs when the message is written
  logEquation(
    component: LogComponent,
    level: LogLevel,
    prefix: string,
    renderFn: () => string
  ): void {
    if (!this.isEnabled(level, component)) return;
    this.log(level, component, `${prefix}: ${renderFn()}`);
  }

  private log(level: LogLevel, component: LogComponent, message: string): void {
    if (this.isEnabled(level, component)) {
      this.sink(this.formatMessage(level, component, message));
    }
  }
}

// Singleton instance
export const debugLogger = new DebugLogger(loggerConfigFromEnv(process.env));
