import pino from 'pino';
import config from 'config';
import metrics from './metrics/index.js';

const level = config.has('logging.level') ? config.get<string>('logging.level') : 'info';
const name = config.has('app.name') ? config.get<string>('app.name') : 'nvr-motion-recorder';

const AVAILABLE_LOG_LEVELS = new Set(
  Object.keys(pino.levels.values).map(level => level.toLowerCase())
);
AVAILABLE_LOG_LEVELS.add('silent');

type LogContext = {
  message?: string;
  camera?: string;
};

function readString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function extractContext(args: unknown[]): LogContext {
  let message: string | undefined;
  let camera: string | undefined;

  for (const value of args) {
    if (typeof value === 'string' && value.length > 0 && !message) {
      message = value;
    } else if (value && typeof value === 'object' && !(value instanceof Error)) {
      camera ??= readString(Reflect.get(value, 'camera'));
      message ??= readString(Reflect.get(value, 'message'));
    }
  }

  return { message, camera };
}

const logger = pino({
  name,
  level,
  hooks: {
    logMethod(inputArgs, method, logLevel) {
      const resolvedLevel =
        typeof logLevel === 'number' ? pino.levels.labels[logLevel] ?? String(logLevel) : logLevel;
      metrics.incrementLogLevel(resolvedLevel, extractContext(inputArgs));
      return method.apply(this, inputArgs);
    }
  }
});

let currentLevel = logger.level;
let lastLevelChangePrevious: string | null = null;
metrics.recordLogLevelChange(currentLevel, currentLevel);

metrics.onReset(() => {
  metrics.recordLogLevelChange(currentLevel, lastLevelChangePrevious ?? currentLevel);
});

function normalizeLevel(value: string) {
  return value.trim().toLowerCase();
}

function assertLevel(level: string) {
  if (!AVAILABLE_LOG_LEVELS.has(level)) {
    const available = Array.from(AVAILABLE_LOG_LEVELS).sort().join(', ');
    throw new Error(`Unknown log level "${level}" (available: ${available})`);
  }
}

export type AppLogger = typeof logger;

export type ComponentLogger = Pick<AppLogger, 'debug' | 'info' | 'warn' | 'error'>;

export function getLogLevel(): string {
  return currentLevel;
}

export function setLogLevel(nextLevel: string): string {
  const normalized = normalizeLevel(nextLevel);
  assertLevel(normalized);
  const previous = currentLevel;
  if (previous === normalized) {
    return currentLevel;
  }

  logger.level = normalized;
  currentLevel = logger.level;
  metrics.recordLogLevelChange(currentLevel, previous);
  lastLevelChangePrevious = previous;
  logger.info({ level: currentLevel }, 'Log level updated');
  return currentLevel;
}

export default logger;
