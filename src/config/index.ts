import fs from 'node:fs';
import path from 'node:path';
import config from 'config';
import type { CameraSettings } from '../types.js';

export type AppConfig = {
  name: string;
};

export type LoggingConfig = {
  level: string;
};

export type NvrConfig = {
  host: string;
  user: string;
  password: string;
  protocol?: 'http' | 'https';
  requestTimeoutMs?: number;
};

export type DetectionConfig = {
  referenceRefreshFrames?: number;
  quietRatio?: number;
  diffThreshold?: number;
  blurPasses?: number;
  dilateIterations?: number;
  frameDelayMs?: number;
  watchdogIntervalMs?: number;
};

export type FfmpegConfig = {
  path?: string;
  rtspTransport?: string;
  framesPerSecond?: number;
  inputArgs?: string[];
  startTimeoutMs?: number;
  readTimeoutMs?: number;
  forceKillTimeoutMs?: number;
  reconnectDelayMs?: number;
  reconnectMaxDelayMs?: number;
  reconnectJitterFactor?: number;
};

export type CameraConfig = {
  name: string;
  rtsp: string;
  nvrChannel: number;
  threshold: number;
  noMotionTimeoutMs: number;
  cooldownMs?: number;
};

export type MonitorConfig = {
  app: AppConfig;
  logging: LoggingConfig;
  nvr: NvrConfig;
  cooldownMs: number;
  detection?: DetectionConfig;
  ffmpeg?: FfmpegConfig;
  cameras: CameraConfig[];
};

type JsonType = 'object' | 'number' | 'string' | 'array';

type JsonSchema = {
  type: JsonType;
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: false;
  items?: JsonSchema;
  enum?: string[];
  minimum?: number;
  maximum?: number;
};

const monitorConfigSchema: JsonSchema = {
  type: 'object',
  required: ['app', 'logging', 'nvr', 'cooldownMs', 'cameras'],
  additionalProperties: false,
  properties: {
    app: {
      type: 'object',
      required: ['name'],
      additionalProperties: false,
      properties: {
        name: { type: 'string' }
      }
    },
    logging: {
      type: 'object',
      required: ['level'],
      additionalProperties: false,
      properties: {
        level: { type: 'string' }
      }
    },
    nvr: {
      type: 'object',
      required: ['host', 'user', 'password'],
      additionalProperties: false,
      properties: {
        host: { type: 'string' },
        user: { type: 'string' },
        password: { type: 'string' },
        protocol: { type: 'string', enum: ['http', 'https'] },
        requestTimeoutMs: { type: 'number', minimum: 1 }
      }
    },
    cooldownMs: { type: 'number', minimum: 0 },
    detection: {
      type: 'object',
      additionalProperties: false,
      properties: {
        referenceRefreshFrames: { type: 'number', minimum: 1 },
        quietRatio: { type: 'number', minimum: 0, maximum: 1 },
        diffThreshold: { type: 'number', minimum: 0, maximum: 255 },
        blurPasses: { type: 'number', minimum: 0 },
        dilateIterations: { type: 'number', minimum: 0 },
        frameDelayMs: { type: 'number', minimum: 0 },
        watchdogIntervalMs: { type: 'number', minimum: 1 }
      }
    },
    ffmpeg: {
      type: 'object',
      additionalProperties: false,
      properties: {
        path: { type: 'string' },
        rtspTransport: { type: 'string', enum: ['tcp', 'udp', 'http', 'udp_multicast'] },
        framesPerSecond: { type: 'number', minimum: 1 },
        inputArgs: {
          type: 'array',
          items: { type: 'string' }
        },
        startTimeoutMs: { type: 'number', minimum: 0 },
        readTimeoutMs: { type: 'number', minimum: 1 },
        forceKillTimeoutMs: { type: 'number', minimum: 0 },
        reconnectDelayMs: { type: 'number', minimum: 0 },
        reconnectMaxDelayMs: { type: 'number', minimum: 0 },
        reconnectJitterFactor: { type: 'number', minimum: 0, maximum: 1 }
      }
    },
    cameras: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'rtsp', 'nvrChannel', 'threshold', 'noMotionTimeoutMs'],
        additionalProperties: false,
        properties: {
          name: { type: 'string' },
          rtsp: { type: 'string' },
          nvrChannel: { type: 'number', minimum: 1 },
          threshold: { type: 'number', minimum: 0 },
          noMotionTimeoutMs: { type: 'number', minimum: 0 },
          cooldownMs: { type: 'number', minimum: 0 }
        }
      }
    }
  }
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function validateAgainstSchema(schema: JsonSchema, value: unknown, pathLabel: string): string[] {
  const { type } = schema;
  const errors: string[] = [];

  if (type === 'object') {
    if (!isRecord(value)) {
      errors.push(`${pathLabel} must be an object`);
      return errors;
    }

    for (const key of schema.required ?? []) {
      if (!(key in value)) {
        errors.push(`${pathLabel}.${key} is required`);
      }
    }

    if (schema.additionalProperties === false) {
      const definedProperties = new Set(Object.keys(schema.properties ?? {}));
      for (const key of Object.keys(value)) {
        if (!definedProperties.has(key)) {
          errors.push(`${pathLabel}.${key} is not allowed`);
        }
      }
    }

    for (const [key, childSchema] of Object.entries(schema.properties ?? {})) {
      if (!(key in value)) {
        continue;
      }
      errors.push(...validateAgainstSchema(childSchema, value[key], `${pathLabel}.${key}`));
    }

    return errors;
  }

  if (type === 'array') {
    if (!Array.isArray(value)) {
      errors.push(`${pathLabel} must be an array`);
      return errors;
    }

    const itemSchema = schema.items;
    if (itemSchema) {
      value.forEach((item, index) => {
        errors.push(...validateAgainstSchema(itemSchema, item, `${pathLabel}[${index}]`));
      });
    }

    return errors;
  }

  if (type === 'number') {
    if (typeof value !== 'number' || Number.isNaN(value)) {
      errors.push(`${pathLabel} must be a number`);
      return errors;
    }

    if (typeof schema.minimum === 'number' && value < schema.minimum) {
      errors.push(`${pathLabel} must be >= ${schema.minimum}`);
    }

    if (typeof schema.maximum === 'number' && value > schema.maximum) {
      errors.push(`${pathLabel} must be <= ${schema.maximum}`);
    }

    return errors;
  }

  if (type === 'string') {
    if (typeof value !== 'string') {
      errors.push(`${pathLabel} must be a string`);
      return errors;
    }

    if (schema.enum && !schema.enum.includes(value)) {
      errors.push(`${pathLabel} must be one of ${schema.enum.join(', ')}`);
    }
  }

  return errors;
}

export function validateConfig(candidate: unknown): asserts candidate is MonitorConfig {
  const errors = validateAgainstSchema(monitorConfigSchema, candidate, 'config');
  if (errors.length > 0) {
    throw new Error(errors.join('; '));
  }
  // The schema pass guarantees the shape; the logical pass checks cross-field rules.
  validateLogicalConfig(candidate as MonitorConfig);
}

function validateLogicalConfig(candidate: MonitorConfig) {
  const messages: string[] = [];

  if (candidate.nvr.host.trim().length === 0) {
    messages.push('config.nvr.host must be a non-empty string');
  }

  if (candidate.cameras.length === 0) {
    messages.push('config.cameras must define at least one camera');
  }

  const names = new Map<string, string>();
  const channels = new Map<number, string>();

  candidate.cameras.forEach((camera, index) => {
    const label = camera.name.trim() || `#${index}`;

    if (camera.name.trim().length === 0) {
      messages.push(`config.cameras[${index}] must specify a non-empty name`);
    } else {
      const normalized = camera.name.trim().toLowerCase();
      const existing = names.get(normalized);
      if (existing) {
        messages.push(
          `config.cameras[${label}] duplicates camera name "${existing}" ignoring case`
        );
      } else {
        names.set(normalized, camera.name);
      }
    }

    if (camera.rtsp.trim().length === 0) {
      messages.push(`config.cameras[${label}] must specify a non-empty rtsp locator`);
    }

    if (!Number.isInteger(camera.nvrChannel)) {
      messages.push(`config.cameras[${label}].nvrChannel must be a positive integer`);
    } else {
      const owner = channels.get(camera.nvrChannel);
      if (owner) {
        messages.push(
          `config.cameras[${label}] reuses nvrChannel ${camera.nvrChannel} already assigned to camera "${owner}"`
        );
      } else {
        channels.set(camera.nvrChannel, label);
      }
    }
  });

  const ffmpeg = candidate.ffmpeg;
  if (
    typeof ffmpeg?.reconnectDelayMs === 'number' &&
    typeof ffmpeg.reconnectMaxDelayMs === 'number' &&
    ffmpeg.reconnectMaxDelayMs < ffmpeg.reconnectDelayMs
  ) {
    messages.push('config.ffmpeg.reconnectMaxDelayMs must be greater than or equal to reconnectDelayMs');
  }

  if (messages.length > 0) {
    throw new Error(messages.join('; '));
  }
}

export function parseConfig(contents: string): MonitorConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse configuration: ${message}`);
  }

  validateConfig(parsed);
  return parsed;
}

export function loadConfigFromFile(filePath: string): MonitorConfig {
  const resolvedPath = path.resolve(filePath);
  const contents = fs.readFileSync(resolvedPath, 'utf-8');
  return parseConfig(contents);
}

/**
 * Reads the merged node-config tree (`config/default.json` plus the
 * environment overlay) and validates it.
 */
export function loadConfig(): MonitorConfig {
  const merged: unknown = config.util.toObject();
  validateConfig(merged);
  return merged;
}

export function trackIdForChannel(channel: number): number {
  return channel * 100 + 1;
}

export function resolveCameras(candidate: MonitorConfig): CameraSettings[] {
  return candidate.cameras.map(camera =>
    Object.freeze({
      name: camera.name.trim(),
      rtsp: camera.rtsp,
      nvrChannel: camera.nvrChannel,
      trackId: trackIdForChannel(camera.nvrChannel),
      threshold: camera.threshold,
      noMotionTimeoutMs: camera.noMotionTimeoutMs,
      cooldownMs: camera.cooldownMs ?? candidate.cooldownMs
    })
  );
}

export { monitorConfigSchema };
