import { performance } from 'node:perf_hooks';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics from '../metrics/index.js';
import type {
  CameraSettings,
  Clock,
  MotionOutcome,
  RecordingPhase,
  RecordingStateSnapshot
} from '../types.js';
import { delay } from '../utils/delay.js';
import type { RecorderClient } from './client.js';

export interface RecordingCoordinatorOptions {
  camera: Pick<CameraSettings, 'name' | 'trackId' | 'threshold' | 'cooldownMs' | 'noMotionTimeoutMs'>;
  client: RecorderClient;
  signal: AbortSignal;
  watchdogIntervalMs?: number;
  clock?: Clock;
  logger?: ComponentLogger;
}

const DEFAULT_WATCHDOG_INTERVAL_MS = 1000;

/**
 * Authoritative recording state for one camera.
 *
 * Every check-and-set on the state happens synchronously, before the first
 * `await` of the method that performs it, so concurrent `onMotion` calls are
 * linearised by the event loop: only one of them can move the phase from
 * `idle` to `starting`.
 */
export class RecordingCoordinator {
  private phase: RecordingPhase = 'idle';
  private lastMotionAt: number | null = null;
  private lastStartAt: number | null = null;
  private pendingStart: Promise<MotionOutcome> | null = null;
  private watchdog: Promise<void> | null = null;
  private episodes = 0;
  private readonly clock: Clock;
  private readonly log: ComponentLogger;
  private readonly watchdogIntervalMs: number;

  constructor(private readonly options: RecordingCoordinatorOptions) {
    this.clock = options.clock ?? (() => performance.now());
    this.log = options.logger ?? loggerModule;
    this.watchdogIntervalMs = options.watchdogIntervalMs ?? DEFAULT_WATCHDOG_INTERVAL_MS;
  }

  get cameraName() {
    return this.options.camera.name;
  }

  isRecording() {
    return this.phase === 'recording' || this.phase === 'stopping';
  }

  getState(): RecordingStateSnapshot {
    return {
      camera: this.options.camera.name,
      trackId: this.options.camera.trackId,
      phase: this.phase,
      isRecording: this.isRecording(),
      lastMotionAt: this.lastMotionAt,
      lastStartAt: this.lastStartAt,
      watchdogActive: this.watchdog !== null,
      episodes: this.episodes
    };
  }

  async onMotion(score: number, now: number = this.clock()): Promise<MotionOutcome> {
    const { name, threshold, cooldownMs } = this.options.camera;
    if (score <= threshold) {
      return 'ignored';
    }

    const previousMotionAt = this.lastMotionAt;
    this.lastMotionAt = previousMotionAt === null ? now : Math.max(previousMotionAt, now);
    metrics.incrementCameraCounter(name, 'motionEvents');

    if (this.isRecording()) {
      metrics.incrementCameraCounter(name, 'suppressed.recording');
      return 'already-recording';
    }

    if (this.phase === 'starting') {
      metrics.incrementCameraCounter(name, 'suppressed.pending');
      return 'start-pending';
    }

    if (previousMotionAt !== null && now - previousMotionAt < cooldownMs) {
      metrics.incrementCameraCounter(name, 'suppressed.cooldown');
      this.log.debug(
        { camera: name, sinceMotionMs: now - previousMotionAt, cooldownMs },
        'Start suppressed by cooldown'
      );
      return 'cooldown';
    }

    this.phase = 'starting';
    const attempt = this.startRecording(now);
    this.pendingStart = attempt;
    try {
      return await attempt;
    } finally {
      if (this.pendingStart === attempt) {
        this.pendingStart = null;
      }
    }
  }

  /** Resolves once no start call is in flight and no watchdog is running. */
  async whenIdle(): Promise<void> {
    while (this.pendingStart || this.watchdog) {
      await Promise.allSettled([this.pendingStart, this.watchdog]);
    }
  }

  private async startRecording(now: number): Promise<MotionOutcome> {
    const { name, trackId } = this.options.camera;
    const started = performance.now();

    try {
      const response = await this.options.client.startTrack(trackId);
      metrics.recordRecorderCall('start', 'ok', {
        camera: name,
        durationMs: performance.now() - started
      });
      this.phase = 'recording';
      this.lastStartAt = now;
      this.episodes += 1;
      metrics.setCameraGauge(name, 'recording', 1);
      this.log.info({ camera: name, trackId, status: response.status }, 'Recording started');
    } catch (error) {
      // No cooldown anchor after a failed start: the next event retries.
      this.phase = 'idle';
      this.lastMotionAt = null;
      metrics.recordRecorderCall('start', 'error', {
        camera: name,
        durationMs: performance.now() - started
      });
      metrics.recordCameraError(name, errorMessage(error));
      this.log.error({ camera: name, trackId, err: error }, 'Record start failed');
      return 'start-failed';
    }

    this.ensureWatchdog();
    return 'started';
  }

  private ensureWatchdog() {
    if (this.watchdog || this.options.signal.aborted) {
      return;
    }

    const run = this.runWatchdog().finally(() => {
      if (this.watchdog === run) {
        this.watchdog = null;
        metrics.setCameraGauge(this.options.camera.name, 'watchdogActive', 0);
      }
    });
    this.watchdog = run;
    metrics.setCameraGauge(this.options.camera.name, 'watchdogActive', 1);
  }

  private async runWatchdog(): Promise<void> {
    const { noMotionTimeoutMs } = this.options.camera;
    const { signal } = this.options;

    while (!signal.aborted && this.phase === 'recording') {
      const now = this.clock();
      const lastMotionAt = this.lastMotionAt ?? now;
      if (now - lastMotionAt > noMotionTimeoutMs) {
        await this.stopRecording(now - lastMotionAt);
        return;
      }
      await delay(this.watchdogIntervalMs, signal);
    }
  }

  private async stopRecording(idleMs: number) {
    const { name, trackId } = this.options.camera;
    this.phase = 'stopping';
    const started = performance.now();

    try {
      const response = await this.options.client.stopTrack(trackId);
      metrics.recordRecorderCall('stop', 'ok', {
        camera: name,
        durationMs: performance.now() - started
      });
      this.log.info(
        { camera: name, trackId, status: response.status, idleMs },
        'Recording stopped'
      );
    } catch (error) {
      // Local state is cleared regardless; the recorder may still be recording.
      metrics.recordRecorderCall('stop', 'error', {
        camera: name,
        durationMs: performance.now() - started
      });
      metrics.incrementCameraCounter(name, 'stopFailures');
      metrics.recordCameraError(name, errorMessage(error));
      this.log.error({ camera: name, trackId, err: error }, 'Record stop failed');
    } finally {
      this.phase = 'idle';
      metrics.setCameraGauge(name, 'recording', 0);
    }
  }
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export default RecordingCoordinator;
