// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[groupfile]" or "[generate]").
    */
   prefix?: string;
}

/**
 * Minimal ANSI color helpers (no external deps).
 */
const supportsColor =
   typeof process !== 'undefined' &&
   process.stdout &&
   process.stdout.isTTY &&
   process.env.NO_COLOR !== '1';

type ColorFn = (text: string) => string;

function wrap(code: number): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (supportsColor ? `${open}${text}${close}` : text);
}

const color = {
   red: wrap(31),
   yellow: wrap(33),
   green: wrap(32),
   cyan: wrap(36),
   magenta: wrap(35),
   dim: wrap(2),
   bold: wrap(1),
   gray: wrap(90),
};

const LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
   if (!value) return undefined;
   const normalized = value.trim().toLowerCase();
   return LEVELS.find((lvl) => lvl === normalized);
}

function colorForLevel(level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return color.red;
      case 'warn':
         return color.yellow;
      case 'info':
         return color.cyan;
      case 'debug':
         return color.gray;
      default:
         return (s) => s;
   }
}

/**
 * Errors raised by the generator carry the step that failed and,
 * where there is one, the offending path.
 */
function describeError(err: Error): string {
   const step = 'step' in err && typeof err.step === 'string' ? err.step : undefined;
   const target = 'path' in err && typeof err.path === 'string' ? err.path : undefined;
   const head = step ? `[${step}] ${err.message}` : err.message;
   return target ? `${head} (${target})` : head;
}

/**
 * Minimal logger for the groupfile CLI with colored output.
 */
export class Logger {
   private level: LogLevel;
   private prefix: string | undefined;

   constructor(options: LoggerOptions = {}) {
      this.level = options.level ?? 'info';
      this.prefix = options.prefix;
   }

   setLevel(level: LogLevel) {
      this.level = level;
   }

   getLevel(): LogLevel {
      return this.level;
   }

   /**
    * Create a child logger with an additional prefix.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({ level: this.level, prefix: combined });
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? describeError(msg)
               : String(msg);

      const levelColor = colorForLevel(lvl);
      const prefixColored = this.prefix
         ? color.magenta(this.prefix)
         : undefined;

      const textColored =
         lvl === 'debug' ? color.dim(text) : levelColor(text);

      if (prefixColored) {
         return `${prefixColored} ${textColored}`;
      }

      return textColored;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      const currentIdx = LEVELS.indexOf(this.level);
      const targetIdx = LEVELS.indexOf(targetLevel);
      if (currentIdx === -1 || targetIdx === -1) return true;
      if (this.level === 'silent') return false;
      return targetIdx <= currentIdx || targetLevel === 'error';
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      console.error(this.formatMessage(msg, 'error'), ...rest);
   }

   /**
    * Report a failure that ends the process. Printed at every level,
    * including 'silent'.
    */
   fatal(msg: unknown, ...rest: unknown[]) {
      console.error(this.formatMessage(msg, 'error'), ...rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      console.warn(this.formatMessage(msg, 'warn'), ...rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      console.log(this.formatMessage(msg, 'info'), ...rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      console.debug(this.formatMessage(msg, 'debug'), ...rest);
   }
}

/**
 * Default process-wide logger used by CLI and core.
 * Level can be controlled via GROUPFILE_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
   level: parseLogLevel(process.env.GROUPFILE_LOG_LEVEL) ?? 'info',
   prefix: '[groupfile]',
});