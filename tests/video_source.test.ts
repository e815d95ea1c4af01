import type { FfmpegCommand } from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { PassThrough } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import metrics from '../src/metrics/index.js';
import {
  VideoSource,
  classifyRtspError,
  slicePng,
  type CommandFactoryOptions,
  type SourceClosedEvent,
  type VideoSourceOptions
} from '../src/video/source.js';
import { createGreyPng } from './helpers/frames.js';

const FRAME_A = createGreyPng(2, 2, 10);
const FRAME_B = createGreyPng(2, 2, 120);
const FRAME_C = createGreyPng(2, 2, 240);

function flush() {
  return new Promise<void>(resolve => {
    setImmediate(resolve);
  });
}

function createSource(overrides: Partial<VideoSourceOptions> = {}, commandOptions: { exitOnKill?: boolean } = {}) {
  const commands: FakeCommand[] = [];
  const commandFactory = vi.fn((_options: CommandFactoryOptions) => {
    const command = new FakeCommand(commandOptions.exitOnKill ?? false);
    commands.push(command);
    return command as unknown as FfmpegCommand;
  });

  const source = new VideoSource({
    input: 'rtsp://127.0.0.1:8554/garage',
    camera: 'garage',
    framesPerSecond: 5,
    rtspTransport: 'tcp',
    startTimeoutMs: 1000,
    readTimeoutMs: 500,
    forceKillTimeoutMs: 0,
    commandFactory,
    ...overrides
  });

  const closed: SourceClosedEvent[] = [];
  source.on('closed', (event: SourceClosedEvent) => {
    closed.push(event);
  });

  return { source, commands, commandFactory, closed };
}

async function openWithFrame(source: VideoSource, commands: FakeCommand[], frame = FRAME_A) {
  const opening = source.open();
  const command = commands.at(-1);
  if (!command) {
    throw new Error('No ffmpeg command was created');
  }
  command.pushFrame(frame);
  return opening;
}

describe('VideoSource', () => {
  beforeEach(() => {
    metrics.reset();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('SourceOpenDeliversFirstFrame', async () => {
    const { source, commands, commandFactory } = createSource();

    await expect(openWithFrame(source, commands)).resolves.toBe(true);

    expect(commandFactory).toHaveBeenCalledWith({
      input: 'rtsp://127.0.0.1:8554/garage',
      framesPerSecond: 5,
      inputArgs: undefined,
      rtspTransport: 'tcp'
    });
    expect(source.isOpened()).toBe(true);
    await expect(source.read()).resolves.toEqual(FRAME_A);

    await source.release();
  });

  it('SourceKeepsOnlyNewestFrame', async () => {
    const { source, commands } = createSource();
    await openWithFrame(source, commands);
    await source.read();

    commands[0].stream.write(Buffer.concat([FRAME_B, FRAME_C]));
    await flush();

    expect(source.getDroppedFrames()).toBe(1);
    expect(metrics.snapshot().cameras.garage.counters.droppedFrames).toBe(1);
    await expect(source.read()).resolves.toEqual(FRAME_C);

    await source.release();
  });

  it('SourceReassemblesSplitChunks', async () => {
    const { source, commands } = createSource();
    await openWithFrame(source, commands);
    await source.read();

    commands[0].stream.write(FRAME_B.subarray(0, 12));
    await flush();
    const reading = source.read();
    commands[0].stream.write(FRAME_B.subarray(12));

    await expect(reading).resolves.toEqual(FRAME_B);
    await source.release();
  });

  it('SourceReadTimeoutClosesStream', async () => {
    vi.useFakeTimers();
    const { source, commands, closed } = createSource();
    await openWithFrame(source, commands);
    await source.read();

    const reading = source.read();
    await vi.advanceTimersByTimeAsync(500);

    await expect(reading).resolves.toBeNull();
    expect(closed).toEqual([{ camera: 'garage', reason: 'read-timeout', rtspError: null, error: null }]);
    expect(source.isOpened()).toBe(false);
    await expect(source.read()).resolves.toBeNull();
  });

  it('SourceStartTimeoutReleasesCommand', async () => {
    vi.useFakeTimers();
    const { source, commands, closed } = createSource();

    const opening = source.open();
    await vi.advanceTimersByTimeAsync(1001);

    await expect(opening).resolves.toBe(false);
    expect(closed.map(event => event.reason)).toEqual(['start-timeout']);
    expect(commands[0].killedSignals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(commands[0].stream.destroyed).toBe(true);
  });

  it('SourceReleaseWaitsForProcessExit', async () => {
    vi.useFakeTimers();
    const { source, commands } = createSource({ forceKillTimeoutMs: 5000 }, { exitOnKill: true });
    await openWithFrame(source, commands);

    await source.release();

    expect(commands[0].killedSignals).toEqual(['SIGTERM']);
    expect(source.isOpened()).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('SourceReleaseForceKillsStuckProcess', async () => {
    vi.useFakeTimers();
    const { source, commands } = createSource({ forceKillTimeoutMs: 5000 });
    await openWithFrame(source, commands);

    let released = false;
    const releasing = source.release().then(() => {
      released = true;
    });
    await vi.advanceTimersByTimeAsync(4999);
    expect(released).toBe(false);
    expect(commands[0].killedSignals).toEqual(['SIGTERM']);

    await vi.advanceTimersByTimeAsync(1);
    await releasing;
    expect(commands[0].killedSignals).toEqual(['SIGTERM', 'SIGKILL']);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('SourceFfmpegErrorClassifiesRtspFailure', async () => {
    const { source, commands, commandFactory, closed } = createSource();
    await openWithFrame(source, commands);

    const error = new Error('ffmpeg exited with code 1');
    commands[0].emit('stderr', 'method DESCRIBE failed: 401 Unauthorized');
    commands[0].emit('error', error);

    expect(closed).toEqual([{ camera: 'garage', reason: 'ffmpeg-error', rtspError: 'auth', error }]);
    expect(source.isOpened()).toBe(false);
    await expect(source.read()).resolves.toBeNull();
    expect(metrics.snapshot().cameras.garage.counters['sourceClosed.ffmpeg-error']).toBe(1);

    await source.release();
    expect(commands[0].killedSignals).toEqual(['SIGTERM']);

    await expect(openWithFrame(source, commands, FRAME_B)).resolves.toBe(true);
    expect(commandFactory).toHaveBeenCalledTimes(2);
    await expect(source.read()).resolves.toEqual(FRAME_B);

    await source.release();
  });

  it('SourceCorruptedStreamCloses', async () => {
    const { source, commands, closed } = createSource({ maxBufferBytes: 16 });
    await openWithFrame(source, commands);

    commands[0].stream.write(Buffer.alloc(32, 1));
    await flush();

    expect(closed).toHaveLength(1);
    expect(closed[0].reason).toBe('corrupted-frame');
    expect(closed[0].error?.message).toBe('Corrupted frame encountered');
    expect(source.isOpened()).toBe(false);

    await source.release();
  });
});

describe('RTSP helpers', () => {
  it('RtspErrorsAreClassified', () => {
    expect(classifyRtspError('method DESCRIBE failed: 401 Unauthorized')).toBe('auth');
    expect(classifyRtspError('method DESCRIBE failed: 404 Not Found')).toBe('notFound');
    expect(classifyRtspError('Connection timed out')).toBe('timeout');
    expect(classifyRtspError('Connection refused')).toBe('network');
    expect(classifyRtspError('Stream #0:0: Video: h264')).toBe('other');
    expect(classifyRtspError('   ')).toBe('other');
  });

  it('SlicePngSplitsCompleteImages', () => {
    const trailing = Buffer.from([1, 2, 3]);
    const result = slicePng(Buffer.concat([FRAME_A, trailing]));

    expect(result?.png).toEqual(FRAME_A);
    expect(result?.remainder).toEqual(trailing);
    expect(slicePng(FRAME_A.subarray(0, FRAME_A.length - 4))).toBeNull();
    expect(slicePng(Buffer.from('not a png at all'))).toBeNull();
  });
});

class FakeCommand extends EventEmitter {
  readonly killedSignals: NodeJS.Signals[] = [];
  readonly stream = new PassThrough();

  constructor(private readonly exitOnKill: boolean) {
    super();
  }

  pipe() {
    return this.stream;
  }

  kill(signal: NodeJS.Signals) {
    this.killedSignals.push(signal);
    if (this.exitOnKill) {
      this.emit('error', new Error(`ffmpeg was killed with signal ${signal}`));
    }
    return this;
  }

  pushFrame(frame: Buffer) {
    this.stream.write(frame);
  }
}
