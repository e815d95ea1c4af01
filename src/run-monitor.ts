import ffmpeg from 'fluent-ffmpeg';
import loggerModule, { type ComponentLogger } from './logger.js';
import metrics from './metrics/index.js';
import {
  loadConfig,
  resolveCameras,
  validateConfig,
  type DetectionConfig,
  type FfmpegConfig,
  type MonitorConfig
} from './config/index.js';
import { CameraSupervisor, type CameraStatus } from './camera/supervisor.js';
import { IsapiRecorderClient, type RecorderClient } from './recorder/client.js';
import { RecordingCoordinator } from './recorder/coordinator.js';
import type { CameraSettings, Clock } from './types.js';
import { MotionDetector } from './video/motionDetector.js';
import { VideoSource, type FrameSource, type SourceClosedEvent } from './video/source.js';

export type SourceFactory = (camera: CameraSettings, ffmpegConfig: FfmpegConfig) => FrameSource;

export type StartMonitorOptions = {
  config?: MonitorConfig;
  client?: RecorderClient;
  createSource?: SourceFactory;
  clock?: Clock;
  logger?: ComponentLogger;
};

export type CameraRuntime = {
  supervisor: CameraSupervisor;
  coordinator: RecordingCoordinator;
};

export type MonitorRuntime = {
  cameras: Map<string, CameraRuntime>;
  done: Promise<void>;
  stop: () => Promise<void>;
  status: () => CameraStatus[];
};

export async function startMonitor(options: StartMonitorOptions = {}): Promise<MonitorRuntime> {
  let config: MonitorConfig;
  if (options.config) {
    validateConfig(options.config);
    config = options.config;
  } else {
    config = loadConfig();
  }
  const log = options.logger ?? loggerModule;
  const detection: DetectionConfig = config.detection ?? {};
  const ffmpegConfig: FfmpegConfig = config.ffmpeg ?? {};

  if (ffmpegConfig.path) {
    ffmpeg.setFfmpegPath(ffmpegConfig.path);
  }

  const client =
    options.client ??
    new IsapiRecorderClient({
      host: config.nvr.host,
      user: config.nvr.user,
      password: config.nvr.password,
      protocol: config.nvr.protocol,
      requestTimeoutMs: config.nvr.requestTimeoutMs
    });
  const createSource = options.createSource ?? ((camera, settings) => createVideoSource(camera, settings, log));

  const controller = new AbortController();
  const cameras = new Map<string, CameraRuntime>();

  for (const camera of resolveCameras(config)) {
    const coordinator = new RecordingCoordinator({
      camera,
      client,
      signal: controller.signal,
      watchdogIntervalMs: detection.watchdogIntervalMs,
      clock: options.clock,
      logger: log
    });
    const detector = new MotionDetector({
      camera: camera.name,
      threshold: camera.threshold,
      referenceRefreshFrames: detection.referenceRefreshFrames,
      quietRatio: detection.quietRatio,
      diffThreshold: detection.diffThreshold,
      blurPasses: detection.blurPasses,
      dilateIterations: detection.dilateIterations
    });
    const supervisor = new CameraSupervisor({
      camera,
      source: createSource(camera, ffmpegConfig),
      detector,
      coordinator,
      frameDelayMs: detection.frameDelayMs,
      reconnect: {
        delayMs: ffmpegConfig.reconnectDelayMs ?? 2000,
        maxDelayMs: ffmpegConfig.reconnectMaxDelayMs ?? 10_000,
        jitterFactor: ffmpegConfig.reconnectJitterFactor ?? 0.2
      },
      clock: options.clock,
      logger: log
    });
    cameras.set(camera.name, { supervisor, coordinator });
  }

  const done = Promise.all(
    Array.from(cameras.values(), ({ supervisor }) =>
      supervisor.run(controller.signal).catch(error => {
        metrics.recordCameraError(supervisor.name, error instanceof Error ? error.message : String(error));
        log.error({ camera: supervisor.name, err: error }, 'Camera worker crashed');
      })
    )
  ).then(() => {
    log.info({ cameras: cameras.size }, 'Monitor stopped');
  });

  log.info({ cameras: Array.from(cameras.keys()) }, 'Monitor started');

  const stop = () => {
    if (!controller.signal.aborted) {
      log.info('Stopping monitor');
      controller.abort();
    }
    return done;
  };

  return {
    cameras,
    done,
    stop,
    status: () => Array.from(cameras.values(), ({ supervisor }) => supervisor.getStatus())
  };
}

export function createVideoSource(
  camera: CameraSettings,
  settings: FfmpegConfig,
  log: ComponentLogger = loggerModule
): VideoSource {
  const source = new VideoSource({
    input: camera.rtsp,
    camera: camera.name,
    framesPerSecond: settings.framesPerSecond,
    rtspTransport: settings.rtspTransport,
    inputArgs: settings.inputArgs,
    startTimeoutMs: settings.startTimeoutMs,
    readTimeoutMs: settings.readTimeoutMs,
    forceKillTimeoutMs: settings.forceKillTimeoutMs
  });

  source.on('closed', (event: SourceClosedEvent) => {
    log.warn(
      {
        camera: event.camera,
        reason: event.reason,
        rtspError: event.rtspError,
        err: event.error ?? undefined
      },
      'Video stream closed'
    );
  });

  return source;
}
