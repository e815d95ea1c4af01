import { performance } from 'node:perf_hooks';
import loggerModule, { type ComponentLogger } from '../logger.js';
import metrics from '../metrics/index.js';
import type { RecordingCoordinator } from '../recorder/coordinator.js';
import type { CameraSettings, Clock, MotionOutcome, RecordingPhase } from '../types.js';
import { computeBackoffDelay, type BackoffPolicy } from '../utils/backoff.js';
import { delay } from '../utils/delay.js';
import type { MotionDetector, MotionSample } from '../video/motionDetector.js';
import type { FrameSource } from '../video/source.js';

export interface CameraSupervisorOptions {
  camera: CameraSettings;
  source: FrameSource;
  detector: Pick<MotionDetector, 'nextScore'>;
  coordinator: Pick<RecordingCoordinator, 'onMotion' | 'whenIdle' | 'isRecording' | 'getState'>;
  frameDelayMs?: number;
  reconnect?: BackoffPolicy;
  clock?: Clock;
  logger?: ComponentLogger;
}

export type CameraStatus = {
  camera: string;
  running: boolean;
  connected: boolean;
  frames: number;
  reconnects: number;
  failedConnects: number;
  readFailures: number;
  motionEvents: number;
  phase: RecordingPhase;
};

const DEFAULT_FRAME_DELAY_MS = 33;
const DEFAULT_RECONNECT_POLICY: BackoffPolicy = {
  delayMs: 2000,
  maxDelayMs: 10_000,
  jitterFactor: 0.2
};
const QUIET_LOG_EVERY_FRAMES = 30;

/**
 * Per-camera detection loop. Motion events are handed to the coordinator
 * without awaiting them so recorder calls never stall frame processing.
 */
export class CameraSupervisor {
  private running = false;
  private frames = 0;
  private reconnects = 0;
  private failedConnects = 0;
  private consecutiveConnectFailures = 0;
  private readFailures = 0;
  private motionEvents = 0;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly clock: Clock;
  private readonly log: ComponentLogger;
  private readonly frameDelayMs: number;
  private readonly reconnectPolicy: BackoffPolicy;

  constructor(private readonly options: CameraSupervisorOptions) {
    this.clock = options.clock ?? (() => performance.now());
    this.log = options.logger ?? loggerModule;
    this.frameDelayMs = options.frameDelayMs ?? DEFAULT_FRAME_DELAY_MS;
    this.reconnectPolicy = options.reconnect ?? DEFAULT_RECONNECT_POLICY;
  }

  get name() {
    return this.options.camera.name;
  }

  getStatus(): CameraStatus {
    return {
      camera: this.options.camera.name,
      running: this.running,
      connected: this.options.source.isOpened(),
      frames: this.frames,
      reconnects: this.reconnects,
      failedConnects: this.failedConnects,
      readFailures: this.readFailures,
      motionEvents: this.motionEvents,
      phase: this.options.coordinator.getState().phase
    };
  }

  async run(signal: AbortSignal): Promise<void> {
    const camera = this.options.camera.name;
    if (this.running) {
      throw new Error(`Camera ${camera} is already running`);
    }

    this.running = true;
    this.log.info({ camera, trackId: this.options.camera.trackId }, 'Camera worker started');

    try {
      while (!signal.aborted) {
        try {
          await this.step(signal);
        } catch (error) {
          metrics.recordCameraError(camera, error instanceof Error ? error.message : String(error));
          this.log.error({ camera, err: error }, 'Camera loop iteration failed');
          await delay(this.frameDelayMs, signal);
        }
      }
    } finally {
      await this.shutdown();
    }
  }

  private async step(signal: AbortSignal) {
    const { source } = this.options;

    if (!source.isOpened()) {
      await this.connect(signal);
      return;
    }

    const frame = await source.read();
    this.frames += 1;
    metrics.incrementCameraCounter(this.options.camera.name, 'frames');

    if (!frame) {
      this.readFailures += 1;
      metrics.incrementCameraCounter(this.options.camera.name, 'readFailures');
      return;
    }

    const sample = this.score(frame);
    if (sample) {
      this.handleSample(sample);
    }

    await delay(this.frameDelayMs, signal);
  }

  private async connect(signal: AbortSignal) {
    const camera = this.options.camera.name;
    this.log.info({ camera, reconnects: this.reconnects }, `Reconnecting... (#${this.reconnects})`);

    await this.options.source.release();
    const connected = await this.options.source.open();

    if (connected) {
      this.reconnects += 1;
      this.consecutiveConnectFailures = 0;
      metrics.incrementCameraCounter(camera, 'reconnects');
      this.log.info({ camera, reconnects: this.reconnects }, 'Connected');
      return;
    }

    this.failedConnects += 1;
    this.consecutiveConnectFailures += 1;
    metrics.incrementCameraCounter(camera, 'failedConnects');
    const { delayMs, meta } = computeBackoffDelay(this.consecutiveConnectFailures, this.reconnectPolicy);
    this.log.warn(
      { camera, attempt: this.consecutiveConnectFailures, delayMs, meta },
      'Stream unavailable, retrying'
    );
    await delay(delayMs, signal);
  }

  private score(frame: Buffer): MotionSample | null {
    try {
      return this.options.detector.nextScore(frame);
    } catch (error) {
      metrics.incrementCameraCounter(this.options.camera.name, 'skippedFrames');
      this.log.warn({ camera: this.options.camera.name, err: error }, 'Frame skipped');
      return null;
    }
  }

  private handleSample(sample: MotionSample) {
    const { name, threshold } = this.options.camera;

    if (sample.referenceSet) {
      this.log.info({ camera: name, reason: sample.refresh }, 'Reference set');
      return;
    }

    if (sample.area > threshold) {
      this.motionEvents += 1;
      if (!this.options.coordinator.isRecording()) {
        this.log.info(
          { camera: name, area: Math.round(sample.area), frame: sample.frame },
          `Motion detected ${Math.round(sample.area)}px`
        );
      }
      this.dispatch(sample.area);
    }

    if (sample.refresh === 'quiet' && sample.frame % QUIET_LOG_EVERY_FRAMES === 0) {
      this.log.debug({ camera: name, frame: sample.frame }, 'Background updated (quiet)');
    }
  }

  private dispatch(area: number) {
    const camera = this.options.camera.name;
    const task: Promise<void> = this.options.coordinator
      .onMotion(area, this.clock())
      .then(
        (outcome: MotionOutcome) => {
          if (outcome !== 'already-recording') {
            this.log.debug({ camera, area, outcome }, 'Motion event handled');
          }
        },
        error => {
          this.log.error({ camera, err: error }, 'Motion event failed');
        }
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private async shutdown() {
    const camera = this.options.camera.name;
    try {
      await this.options.source.release();
    } catch (error) {
      this.log.warn({ camera, err: error }, 'Failed to release stream');
    }

    await Promise.allSettled(Array.from(this.inFlight));
    await this.options.coordinator.whenIdle();
    this.running = false;
    this.log.info(
      { camera, frames: this.frames, reconnects: this.reconnects },
      'Camera worker stopped'
    );
  }
}

export default CameraSupervisor;
