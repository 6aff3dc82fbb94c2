type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

let verbose = isTruthy(process.env.PROVENANCE_AUDIT_DEBUG);

/**
 * Enable or disable debug output. Skipped files, unparseable slices and
 * missing git history are reported at debug level only.
 */
export function setVerboseLogging(enabled: boolean): void {
  verbose = enabled;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (level === 'debug' && !verbose) return;
  // stdout carries the run summary; every log line goes to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

function isTruthy(value: string | undefined): boolean {
  const normalized = value?.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
