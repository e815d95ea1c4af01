import { EventEmitter } from 'node:events';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type CameraMetricState = {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  lastError: string | null;
  lastErrorAt: number | null;
};

export type CameraMetricsSnapshot = {
  counters: CounterMap;
  gauges: CounterMap;
  lastError: string | null;
  lastErrorAt: string | null;
};

export type RecorderOperation = 'start' | 'stop';

export type RecorderCallOutcome = 'ok' | 'error';

export type RecorderCallsSnapshot = {
  total: number;
  byOperation: Record<RecorderOperation, { ok: number; error: number }>;
  byCamera: Record<string, CounterMap>;
};

export type LogLevelMetricsSnapshot = {
  byLevel: CounterMap;
  byCamera: Record<string, CounterMap>;
  current: string | null;
  previous: string | null;
  changedAt: string | null;
};

export type MetricsSnapshot = {
  createdAt: string;
  logs: LogLevelMetricsSnapshot;
  cameras: Record<string, CameraMetricsSnapshot>;
  recorder: RecorderCallsSnapshot;
  latencies: Record<string, LatencyStats>;
};

class MetricsRegistry {
  private readonly logLevels = new Map<string, number>();
  private readonly logLevelsByCamera = new Map<string, Map<string, number>>();
  private currentLogLevel: string | null = null;
  private previousLogLevel: string | null = null;
  private logLevelChangedAt: number | null = null;
  private readonly cameras = new Map<string, CameraMetricState>();
  private readonly recorderCalls = new Map<string, number>();
  private readonly recorderCallsByCamera = new Map<string, Map<string, number>>();
  private readonly latencies = new Map<string, LatencyStats>();
  private readonly events = new EventEmitter();

  reset() {
    this.logLevels.clear();
    this.logLevelsByCamera.clear();
    this.currentLogLevel = null;
    this.previousLogLevel = null;
    this.logLevelChangedAt = null;
    this.cameras.clear();
    this.recorderCalls.clear();
    this.recorderCallsByCamera.clear();
    this.latencies.clear();
    this.events.emit('reset');
  }

  onReset(listener: () => void) {
    this.events.on('reset', listener);
    return () => {
      this.events.off('reset', listener);
    };
  }

  incrementLogLevel(level: string, context?: { message?: string; camera?: string }) {
    const normalized = level.toLowerCase();
    this.logLevels.set(normalized, (this.logLevels.get(normalized) ?? 0) + 1);
    if (context?.camera) {
      const perCamera = this.logLevelsByCamera.get(context.camera) ?? new Map<string, number>();
      perCamera.set(normalized, (perCamera.get(normalized) ?? 0) + 1);
      this.logLevelsByCamera.set(context.camera, perCamera);
    }
  }

  recordLogLevelChange(level: string, previous?: string | null) {
    this.currentLogLevel = level;
    this.previousLogLevel = previous ?? null;
    this.logLevelChangedAt = Date.now();
  }

  incrementCameraCounter(camera: string, counter: string, amount = 1) {
    const state = getCameraState(this.cameras, camera);
    state.counters.set(counter, (state.counters.get(counter) ?? 0) + amount);
  }

  setCameraGauge(camera: string, gauge: string, value: number) {
    if (!Number.isFinite(value)) {
      return;
    }
    const state = getCameraState(this.cameras, camera);
    state.gauges.set(gauge, value);
  }

  recordCameraError(camera: string, message: string) {
    const state = getCameraState(this.cameras, camera);
    state.lastError = message;
    state.lastErrorAt = Date.now();
    state.counters.set('errors', (state.counters.get('errors') ?? 0) + 1);
  }

  recordRecorderCall(
    operation: RecorderOperation,
    outcome: RecorderCallOutcome,
    context: { camera: string; durationMs?: number }
  ) {
    const key = `${operation}.${outcome}`;
    this.recorderCalls.set(key, (this.recorderCalls.get(key) ?? 0) + 1);
    const perCamera = this.recorderCallsByCamera.get(context.camera) ?? new Map<string, number>();
    perCamera.set(key, (perCamera.get(key) ?? 0) + 1);
    this.recorderCallsByCamera.set(context.camera, perCamera);
    if (typeof context.durationMs === 'number') {
      this.observeLatency(`recorder.${operation}`, context.durationMs);
    }
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      return;
    }
    const existing = this.latencies.get(metric);
    if (!existing) {
      this.latencies.set(metric, {
        count: 1,
        totalMs: durationMs,
        minMs: durationMs,
        maxMs: durationMs,
        averageMs: durationMs
      });
      return;
    }
    existing.count += 1;
    existing.totalMs += durationMs;
    existing.minMs = Math.min(existing.minMs, durationMs);
    existing.maxMs = Math.max(existing.maxMs, durationMs);
    existing.averageMs = existing.totalMs / existing.count;
  }

  exportLogLevelMetrics(): LogLevelMetricsSnapshot {
    return {
      byLevel: mapFrom(this.logLevels),
      byCamera: mapFromNested(this.logLevelsByCamera),
      current: this.currentLogLevel,
      previous: this.previousLogLevel,
      changedAt: this.logLevelChangedAt === null ? null : new Date(this.logLevelChangedAt).toISOString()
    };
  }

  snapshot(): MetricsSnapshot {
    const cameras: Record<string, CameraMetricsSnapshot> = {};
    for (const [camera, state] of this.cameras) {
      cameras[camera] = {
        counters: mapFrom(state.counters),
        gauges: mapFrom(state.gauges),
        lastError: state.lastError,
        lastErrorAt: state.lastErrorAt === null ? null : new Date(state.lastErrorAt).toISOString()
      };
    }

    const latencies: Record<string, LatencyStats> = {};
    for (const [metric, stats] of this.latencies) {
      latencies[metric] = { ...stats };
    }

    let total = 0;
    for (const count of this.recorderCalls.values()) {
      total += count;
    }

    return {
      createdAt: new Date().toISOString(),
      logs: this.exportLogLevelMetrics(),
      cameras,
      recorder: {
        total,
        byOperation: {
          start: {
            ok: this.recorderCalls.get('start.ok') ?? 0,
            error: this.recorderCalls.get('start.error') ?? 0
          },
          stop: {
            ok: this.recorderCalls.get('stop.ok') ?? 0,
            error: this.recorderCalls.get('stop.error') ?? 0
          }
        },
        byCamera: mapFromNested(this.recorderCallsByCamera)
      },
      latencies
    };
  }
}

function getCameraState(map: Map<string, CameraMetricState>, camera: string): CameraMetricState {
  let state = map.get(camera);
  if (!state) {
    state = {
      counters: new Map(),
      gauges: new Map(),
      lastError: null,
      lastErrorAt: null
    };
    map.set(camera, state);
  }
  return state;
}

function mapFrom(source: Map<string, number>): CounterMap {
  return Object.fromEntries(source.entries());
}

function mapFromNested(source: Map<string, Map<string, number>>): Record<string, CounterMap> {
  const result: Record<string, CounterMap> = {};
  for (const [key, value] of source) {
    result[key] = mapFrom(value);
  }
  return result;
}

const defaultRegistry = new MetricsRegistry();

export { MetricsRegistry };
export default defaultRegistry;
