import ffmpeg from 'fluent-ffmpeg';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { CameraConfig, MonitorConfig } from '../src/config/index.js';
import metrics from '../src/metrics/index.js';
import type { RecorderClient } from '../src/recorder/client.js';
import { createVideoSource, startMonitor } from '../src/run-monitor.js';
import { VideoSource } from '../src/video/source.js';
import { blockFill, createGreyPng } from './helpers/frames.js';
import { createTestLogger, loggedMessages } from './helpers/logger.js';
import { FakeSource, IDLE_READ_MS } from './helpers/sources.js';

const BACKGROUND = createGreyPng(8, 8, 10);
const INTRUDER = createGreyPng(8, 8, blockFill(10, { x: 3, y: 3, width: 2, height: 2, value: 200 }));

function camera(name: string, nvrChannel: number): CameraConfig {
  return {
    name,
    rtsp: `rtsp://127.0.0.1:8554/${name}`,
    nvrChannel,
    threshold: 3,
    noMotionTimeoutMs: 10_000
  };
}

function monitorConfig(extra: Partial<MonitorConfig> = {}): MonitorConfig {
  return {
    app: { name: 'nvr-motion-recorder' },
    logging: { level: 'silent' },
    nvr: { host: '127.0.0.1:8080', user: 'test-user', password: 'test-secret' },
    cooldownMs: 30_000,
    detection: { blurPasses: 0, dilateIterations: 0, frameDelayMs: 10 },
    ffmpeg: { reconnectDelayMs: 100, reconnectMaxDelayMs: 400, reconnectJitterFactor: 0 },
    cameras: [camera('porch', 1), camera('yard', 2)],
    ...extra
  };
}

function createClient() {
  return {
    startTrack: vi.fn<RecorderClient['startTrack']>(async () => ({ status: 200 })),
    stopTrack: vi.fn<RecorderClient['stopTrack']>(async () => ({ status: 200 }))
  };
}

describe('startMonitor', () => {
  let sources: Map<string, FakeSource>;
  let scriptedFrames: Map<string, Buffer[]>;
  let logger: ReturnType<typeof createTestLogger>;

  function createSource(settings: { name: string }) {
    const source = new FakeSource();
    source.frames.push(...(scriptedFrames.get(settings.name) ?? []));
    sources.set(settings.name, source);
    return source;
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    metrics.reset();
    sources = new Map();
    scriptedFrames = new Map();
    logger = createTestLogger();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it('MonitorRunsEveryCameraUntilStopped', async () => {
    const runtime = await startMonitor({
      config: monitorConfig(),
      client: createClient(),
      createSource,
      clock: () => Date.now(),
      logger
    });

    expect(Array.from(runtime.cameras.keys())).toEqual(['porch', 'yard']);
    await vi.advanceTimersByTimeAsync(50);

    expect(runtime.status().map(status => [status.camera, status.connected, status.reconnects])).toEqual([
      ['porch', true, 1],
      ['yard', true, 1]
    ]);
    expect(logger.info).toHaveBeenCalledWith({ cameras: ['porch', 'yard'] }, 'Monitor started');

    const stopping = runtime.stop();
    expect(runtime.stop()).toBe(stopping);
    await vi.advanceTimersByTimeAsync(IDLE_READ_MS);
    await stopping;

    for (const source of sources.values()) {
      expect(source.release).toHaveBeenCalledTimes(2);
    }
    expect(runtime.status().every(status => !status.running)).toBe(true);
    expect(loggedMessages(logger.info).at(-1)).toBe('Monitor stopped');
  });

  it('MonitorStartsTrackForCameraWithMotion', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response(null, { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    scriptedFrames.set('porch', [BACKGROUND, INTRUDER]);
    scriptedFrames.set('yard', [BACKGROUND, BACKGROUND]);

    const runtime = await startMonitor({ config: monitorConfig(), createSource, clock: () => Date.now(), logger });

    await vi.advanceTimersByTimeAsync(50);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe(
      'http://127.0.0.1:8080/ISAPI/ContentMgmt/record/control/manual/start/tracks/101'
    );
    expect(runtime.cameras.get('porch')?.coordinator.getState()).toMatchObject({
      phase: 'recording',
      lastStartAt: 10
    });
    expect(runtime.cameras.get('yard')?.coordinator.getState().phase).toBe('idle');

    const stopping = runtime.stop();
    await vi.advanceTimersByTimeAsync(IDLE_READ_MS);
    await stopping;

    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('MonitorRejectsInvalidConfiguration', async () => {
    await expect(
      startMonitor({ config: monitorConfig({ cameras: [] }), client: createClient(), createSource, logger })
    ).rejects.toThrow('config.cameras must define at least one camera');
    expect(sources.size).toBe(0);
  });

  it('MonitorLoadsConfigurationWhenNoneGiven', async () => {
    const runtime = await startMonitor({ client: createClient(), createSource, logger });

    expect(Array.from(runtime.cameras.keys())).toEqual(['garage']);

    const stopping = runtime.stop();
    await vi.advanceTimersByTimeAsync(IDLE_READ_MS);
    await stopping;
  });

  it('MonitorAppliesConfiguredFfmpegPath', async () => {
    const setPath = vi.spyOn(ffmpeg, 'setFfmpegPath');
    const runtime = await startMonitor({
      config: monitorConfig({ ffmpeg: { path: '/opt/ffmpeg/bin/ffmpeg' } }),
      client: createClient(),
      createSource,
      logger
    });

    expect(setPath).toHaveBeenCalledWith('/opt/ffmpeg/bin/ffmpeg');

    const stopping = runtime.stop();
    await vi.advanceTimersByTimeAsync(IDLE_READ_MS);
    await stopping;
  });
});

describe('createVideoSource', () => {
  it('VideoSourceLogsClosedStreams', () => {
    const logger = createTestLogger();
    const source = createVideoSource(
      {
        name: 'garage',
        rtsp: 'rtsp://127.0.0.1:8554/garage',
        nvrChannel: 2,
        trackId: 201,
        threshold: 500,
        noMotionTimeoutMs: 10_000,
        cooldownMs: 30_000
      },
      { framesPerSecond: 5, rtspTransport: 'tcp' },
      logger
    );

    expect(source).toBeInstanceOf(VideoSource);
    expect(source.isOpened()).toBe(false);

    source.emit('closed', { camera: 'garage', reason: 'read-timeout', rtspError: 'timeout', error: null });

    expect(logger.warn).toHaveBeenCalledWith(
      { camera: 'garage', reason: 'read-timeout', rtspError: 'timeout', err: undefined },
      'Video stream closed'
    );
  });
});
