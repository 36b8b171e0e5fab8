import path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  LOG = 'LOG',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const SEVERITY: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.LOG]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  [LogLevel.DEBUG]: (line) => console.debug(line),
  [LogLevel.LOG]: (line) => console.log(line),
  [LogLevel.WARN]: (line) => console.warn(line),
  [LogLevel.ERROR]: (line) => console.error(line),
};

/** Trailing key/value pairs rendered after the message. */
type Context = Record<string, unknown>;

type Caller = { fileName: string; functionName: string };

let levelOverride: LogLevel | null = null;

/**
 * Overrides LOG_LEVEL until called again with null.
 */
export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const wanted = value?.toUpperCase();
  return Object.values(LogLevel).find((level) => level === wanted) ?? null;
}

function threshold(): LogLevel {
  return levelOverride ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.WARN;
}

/**
 * File and function `depth` frames up the stack.
 */
function findCaller(depth: number): Caller {
  const previous = Error.prepareStackTrace;
  try {
    Error.prepareStackTrace = (_, stack) => stack;
    const stack = new Error().stack as unknown as NodeJS.CallSite[];
    const frame = stack?.[depth];
    if (frame) {
      const fileName = frame.getFileName();
      return {
        fileName: fileName ? path.basename(fileName, '.ts') : 'unknown',
        functionName: frame.getFunctionName() || 'anonymous',
      };
    }
  } finally {
    Error.prepareStackTrace = previous;
  }
  return { fileName: 'unknown', functionName: 'unknown' };
}

function isContext(value: unknown): value is Context {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.getPrototypeOf(value) === Object.prototype &&
    Object.keys(value).length > 0
  );
}

function render(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * `[SCENARIO |] LEVEL | file:function | message [| key: value ...]`. A plain
 * non-empty object as last argument becomes the key/value tail.
 */
export function formatLogLine(level: LogLevel, fileName: string, functionName: string, args: unknown[]): string {
  const last = args[args.length - 1];
  const context = isContext(last) ? last : null;
  const messageParts = context ? args.slice(0, -1) : args;

  const fields: string[] = [];
  const scenario = process.env.SCENARIO;
  if (scenario) {
    fields.push(scenario);
  }
  fields.push(level, `${fileName}:${functionName}`, messageParts.map(render).join(' '));
  if (context) {
    fields.push(...Object.entries(context).map(([key, value]) => `${key}: ${render(value)}`));
  }
  return fields.join(' | ');
}

function emit(level: LogLevel, args: unknown[]): void {
  if (SEVERITY[level] < SEVERITY[threshold()]) {
    return;
  }
  // emit <- public helper <- caller
  const { fileName, functionName } = findCaller(3);
  WRITERS[level](formatLogLine(level, fileName, functionName, args));
}

/**
 * Message parts joined like console.log, e.g. `debug('Consumed budget', id, { remaining: -70 })`.
 */
export function debug(...args: unknown[]): void {
  emit(LogLevel.DEBUG, args);
}

export function log(...args: unknown[]): void {
  emit(LogLevel.LOG, args);
}

export function warn(...args: unknown[]): void {
  emit(LogLevel.WARN, args);
}

export function err(...args: unknown[]): void {
  emit(LogLevel.ERROR, args);
}

export function logger(level: LogLevel, ...args: unknown[]): void {
  emit(level, args);
}
