// src/logger.ts

import type { LogContext, LoggerInstance, LogLevel, LogRecord } from './types/modbus-types.js';

type LogField = 'timestamp' | 'level' | 'logger' | 'transport' | 'unitId' | 'transactionId';

class Logger {
  private LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

  private currentLevel: LogLevel = 'info';
  private enabled: boolean = true;
  private useColors: boolean = true;

  private COLORS: Record<LogLevel | 'reset', string> = {
    trace: '\x1b[1;35m',
    debug: '\x1b[1;36m',
    info: '\x1b[1;32m',
    warn: '\x1b[1;33m',
    error: '\x1b[1;31m',
    reset: '\x1b[0m',
  };

  private globalContext: LogContext = {};
  private categoryLevels: Record<string, LogLevel | 'none'> = {};
  private logCounts: Record<LogLevel, number> = { trace: 0, debug: 0, info: 0, warn: 0, error: 0 };
  private logFormat: LogField[] = ['timestamp', 'level', 'logger', 'transport', 'unitId'];
  private watchCallback: ((record: LogRecord) => void) | null = null;

  private getTimestamp(): string {
    return new Date().toISOString().slice(11, 23);
  }

  /**
   * Formats a log message according to the specified level and context.
   * @returns Header followed by the printable arguments
   */
  private format(level: LogLevel, args: unknown[], context: LogContext = {}): string[] {
    const color: string = this.useColors ? this.COLORS[level] : '';
    const reset: string = this.useColors ? this.COLORS.reset : '';
    const merged: LogContext = { ...this.globalContext, ...context };

    const headerParts: string[] = [];
    if (this.logFormat.includes('timestamp')) headerParts.push(`[${this.getTimestamp()}]`);
    if (this.logFormat.includes('level')) headerParts.push(`[${level.toUpperCase()}]`);
    if (this.logFormat.includes('logger') && merged.logger) headerParts.push(`[${merged.logger}]`);
    if (this.logFormat.includes('transport') && merged.transport) {
      headerParts.push(`[${merged.transport}]`);
    }
    if (this.logFormat.includes('unitId') && merged.unitId != null) {
      headerParts.push(`[U:${merged.unitId}]`);
    }
    if (this.logFormat.includes('transactionId') && merged.transactionId != null) {
      headerParts.push(`[T:${merged.transactionId}]`);
    }

    const formattedArgs: string[] = args.map(arg => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      return String(arg);
    });

    // Поля, уже выведенные в заголовке, не дублируем
    const contextToPrint: LogContext = { ...context };
    delete contextToPrint.logger;
    delete contextToPrint.transport;
    delete contextToPrint.unitId;
    delete contextToPrint.transactionId;
    if (Object.keys(contextToPrint).length > 0) {
      formattedArgs.push(JSON.stringify(contextToPrint));
    }

    return [`${color}${headerParts.join('')}${reset}`, ...formattedArgs];
  }

  private shouldLog(level: LogLevel, context: LogContext = {}): boolean {
    if (!this.enabled) return false;
    const category = context.logger;
    if (category !== undefined) {
      const categoryLevel = this.categoryLevels[category];
      if (categoryLevel === 'none') return false;
      if (categoryLevel !== undefined) {
        return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(categoryLevel);
      }
    }
    return this.LEVELS.indexOf(level) >= this.LEVELS.indexOf(this.currentLevel);
  }

  private output(level: LogLevel, args: unknown[], context: LogContext): void {
    if (!this.shouldLog(level, context)) return;

    this.logCounts[level] += 1;

    if (this.watchCallback) {
      this.watchCallback({ level, args, context });
    }

    // console.trace prints a stack, route trace through debug
    const method = level === 'trace' ? 'debug' : level;
    console[method](...this.format(level, args, context));
  }

  /**
   * Splits the arguments into the main arguments and a trailing context object.
   */
  private splitArgsAndContext(args: unknown[]): { args: unknown[]; context: LogContext } {
    if (args.length > 1) {
      const lastArg = args[args.length - 1];
      if (isLogContext(lastArg)) {
        return { args: args.slice(0, -1), context: lastArg };
      }
    }
    return { args, context: {} };
  }

  trace(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('trace', newArgs, context);
  }

  debug(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('debug', newArgs, context);
  }

  info(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('info', newArgs, context);
  }

  warn(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('warn', newArgs, context);
  }

  error(...args: unknown[]): void {
    const { args: newArgs, context } = this.splitArgsAndContext(args);
    this.output('error', newArgs, context);
  }

  setLevel(level: LogLevel): void {
    if (this.LEVELS.includes(level)) {
      this.currentLevel = level;
    } else {
      throw new Error(`Unknown log level: ${level}`);
    }
  }

  setLevelFor(category: string, level: LogLevel | 'none'): void {
    if (level !== 'none' && !this.LEVELS.includes(level))
      throw new Error(`Unknown log level: ${level}`);
    this.categoryLevels[category] = level;
  }

  pauseCategory(category: string): void {
    this.categoryLevels[category] = 'none';
  }

  resumeCategory(category: string): void {
    delete this.categoryLevels[category];
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  getLevel(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  disableColors(): void {
    this.useColors = false;
  }

  setGlobalContext(ctx: LogContext): void {
    this.globalContext = { ...ctx };
  }

  setTransportType(type: string): void {
    this.globalContext.transport = type;
  }

  setLogFormat(fields: LogField[]): void {
    const validFields: LogField[] = [
      'timestamp',
      'level',
      'logger',
      'transport',
      'unitId',
      'transactionId',
    ];
    if (!fields.every(f => validFields.includes(f))) {
      throw new Error(`Invalid log format. Valid fields: ${validFields.join(', ')}`);
    }
    this.logFormat = [...fields];
  }

  watch(callback: (record: LogRecord) => void): void {
    this.watchCallback = callback;
  }

  clearWatch(): void {
    this.watchCallback = null;
  }

  getCounts(): Record<LogLevel, number> {
    return { ...this.logCounts };
  }

  /**
   * Creates a logger instance with category.
   * @param name - Logger name
   */
  createLogger(name: string): LoggerInstance {
    if (!name) throw new Error('Logger name required');
    const log = (level: LogLevel, args: unknown[]): void => {
      const { args: newArgs, context } = this.splitArgsAndContext(args);
      this.output(level, newArgs, { ...context, logger: name });
    };
    return {
      trace: (...args: unknown[]) => log('trace', args),
      debug: (...args: unknown[]) => log('debug', args),
      info: (...args: unknown[]) => log('info', args),
      warn: (...args: unknown[]) => log('warn', args),
      error: (...args: unknown[]) => log('error', args),
      setLevel: (lvl: LogLevel) => this.setLevelFor(name, lvl),
      pause: () => this.pauseCategory(name),
      resume: () => this.resumeCategory(name),
    };
  }
}

function isLogContext(value: unknown): value is LogContext {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  if (value instanceof Error || value instanceof Uint8Array) return false;
  return Object.values(value).every(
    v => v === undefined || ['string', 'number', 'boolean'].includes(typeof v)
  );
}

export default Logger;
