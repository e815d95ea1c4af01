import process from 'node:process';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import logger, { setLogLevel } from './logger.js';
import {
  loadConfig,
  loadConfigFromFile,
  resolveCameras,
  type MonitorConfig
} from './config/index.js';
import { IsapiRecorderClient, type TrackOperation } from './recorder/client.js';
import { startMonitor, type MonitorRuntime } from './run-monitor.js';

type CliIo = {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
};

const DEFAULT_IO: CliIo = {
  stdout: process.stdout,
  stderr: process.stderr
};

const USAGE_LINES = [
  'Usage: nvr-motion-recorder <command> [options]',
  '',
  'Commands:',
  '  start                              Run motion detection on every configured camera (default)',
  '  check-config [--config <file>]     Validate configuration and list cameras',
  '  record <start|stop> <camera>       Send a manual record command for one camera',
  '  help                               Show this help message',
  '',
  'Options:',
  '  --log-level <level>                Override logging.level for this run'
];

const RECORD_USAGE = 'Usage: nvr-motion-recorder record <start|stop> <camera> [--config <file>]';

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export async function runCli(argv = process.argv.slice(2), io: CliIo = DEFAULT_IO): Promise<number> {
  const { args, logLevel, error } = extractLogLevel(argv);
  if (error) {
    io.stderr.write(`${error}\n`);
    return 1;
  }

  if (logLevel && applyLogLevel(logLevel, io) !== 0) {
    return 1;
  }

  const command = args[0] ?? 'start';

  switch (command) {
    case 'start': {
      return runStartCommand(io);
    }
    case 'check-config': {
      return runCheckConfigCommand(args.slice(1), io);
    }
    case 'record': {
      return runRecordCommand(args.slice(1), io);
    }
    case 'help':
    case '--help':
    case '-h': {
      io.stdout.write(`${USAGE_LINES.join('\n')}\n`);
      return 0;
    }
    default: {
      io.stderr.write(`Unknown command: ${command}\n`);
      io.stderr.write(`${USAGE_LINES.join('\n')}\n`);
      return 1;
    }
  }
}

type LogLevelArgs = {
  args: string[];
  logLevel: string | null;
  error: string | null;
};

function extractLogLevel(argv: string[]): LogLevelArgs {
  const result: LogLevelArgs = { args: [], logLevel: null, error: null };
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === '--log-level') {
      const value = argv[index + 1];
      if (!value || value.startsWith('-')) {
        result.error = 'Missing value for --log-level';
        return result;
      }
      result.logLevel = value;
      index += 1;
      continue;
    }
    if (token.startsWith('--log-level=')) {
      result.logLevel = token.slice('--log-level='.length);
      continue;
    }
    result.args.push(token);
  }
  return result;
}

function applyLogLevel(level: string, io: CliIo): number {
  try {
    setLogLevel(level);
    return 0;
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }
}

async function runStartCommand(io: CliIo): Promise<number> {
  let runtime: MonitorRuntime;
  try {
    runtime = await startMonitor();
  } catch (error) {
    logger.error({ err: error }, 'Monitor failed to start');
    io.stderr.write(`Monitor failed to start: ${errorMessage(error)}\n`);
    return 1;
  }

  io.stdout.write(`Monitor started (${runtime.cameras.size} cameras)\n`);

  const handleSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutdown requested');
    runtime.stop().catch(error => {
      logger.error({ err: error }, 'Error during shutdown');
    });
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, handleSignal);
  }

  try {
    await runtime.done;
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) {
      process.off(signal, handleSignal);
    }
  }

  io.stdout.write('Monitor stopped\n');
  return 0;
}

type ConfigArgs = {
  configPath: string | null;
  positional: string[];
  errors: string[];
};

function parseConfigArgs(args: string[]): ConfigArgs {
  const result: ConfigArgs = { configPath: null, positional: [], errors: [] };
  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];
    if (token === '--config' || token === '-c') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        result.errors.push(`Missing value for ${token}`);
      } else {
        result.configPath = value;
        index += 1;
      }
      continue;
    }
    if (token.startsWith('--config=')) {
      result.configPath = token.slice('--config='.length);
      continue;
    }
    if (token.startsWith('-')) {
      result.errors.push(`Unknown option: ${token}`);
      continue;
    }
    result.positional.push(token);
  }
  return result;
}

function readConfig(configPath: string | null): MonitorConfig {
  return configPath ? loadConfigFromFile(configPath) : loadConfig();
}

async function runCheckConfigCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseConfigArgs(args);
  if (parsed.errors.length > 0 || parsed.positional.length > 0) {
    const messages = [...parsed.errors, ...parsed.positional.map(token => `Unexpected argument: ${token}`)];
    io.stderr.write(`${messages.join('\n')}\n`);
    return 1;
  }

  let config: MonitorConfig;
  try {
    config = readConfig(parsed.configPath);
  } catch (error) {
    io.stderr.write(`Configuration invalid: ${errorMessage(error)}\n`);
    return 1;
  }

  const cameras = resolveCameras(config);
  io.stdout.write(`Configuration OK: ${cameras.length} camera(s)\n`);
  for (const camera of cameras) {
    io.stdout.write(
      `  ${camera.name} -> channel ${camera.nvrChannel} (track ${camera.trackId}), ` +
        `threshold ${camera.threshold}px, no-motion ${camera.noMotionTimeoutMs}ms, cooldown ${camera.cooldownMs}ms\n`
    );
  }
  return 0;
}

async function runRecordCommand(args: string[], io: CliIo): Promise<number> {
  const parsed = parseConfigArgs(args);
  const [operation, cameraName, ...extra] = parsed.positional;

  if (parsed.errors.length > 0) {
    io.stderr.write(`${parsed.errors.join('\n')}\n`);
    io.stderr.write(`${RECORD_USAGE}\n`);
    return 1;
  }

  if (!isTrackOperation(operation) || !cameraName || extra.length > 0) {
    io.stderr.write(`${RECORD_USAGE}\n`);
    return 1;
  }

  let config: MonitorConfig;
  try {
    config = readConfig(parsed.configPath);
  } catch (error) {
    io.stderr.write(`Configuration invalid: ${errorMessage(error)}\n`);
    return 1;
  }

  const cameras = resolveCameras(config);
  const normalized = cameraName.trim().toLowerCase();
  const camera = cameras.find(candidate => candidate.name.toLowerCase() === normalized);
  if (!camera) {
    const available = cameras.map(candidate => candidate.name).join(', ');
    io.stderr.write(`Unknown camera: ${cameraName} (available: ${available})\n`);
    return 1;
  }

  const client = new IsapiRecorderClient({
    host: config.nvr.host,
    user: config.nvr.user,
    password: config.nvr.password,
    protocol: config.nvr.protocol,
    requestTimeoutMs: config.nvr.requestTimeoutMs
  });

  try {
    const response =
      operation === 'start'
        ? await client.startTrack(camera.trackId)
        : await client.stopTrack(camera.trackId);
    io.stdout.write(
      `Track ${camera.trackId} ${operation} requested for ${camera.name} (HTTP ${response.status})\n`
    );
    return 0;
  } catch (error) {
    logger.error({ camera: camera.name, trackId: camera.trackId, err: error }, 'Manual record command failed');
    io.stderr.write(`${errorMessage(error)}\n`);
    return 1;
  }
}

function isTrackOperation(value: string | undefined): value is TrackOperation {
  return value === 'start' || value === 'stop';
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

const resolvedPath = path.resolve(process.argv[1] ?? '');
const modulePath = fileURLToPath(import.meta.url);

if (resolvedPath === modulePath) {
  runCli().then(
    code => {
      process.exit(code);
    },
    error => {
      logger.error({ err: error }, 'CLI failed');
      process.exit(1);
    }
  );
}
