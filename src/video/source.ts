import ffmpeg from 'fluent-ffmpeg';
import { EventEmitter } from 'node:events';
import { Readable } from 'node:stream';
import metrics from '../metrics/index.js';
import { delay } from '../utils/delay.js';

/**
 * Pull-style frame acquisition for one camera. `read()` resolving `null`
 * means no frame arrived in time; `isOpened()` turning false means the
 * caller should `release()` and `open()` again.
 */
export interface FrameSource {
  isOpened(): boolean;
  open(): Promise<boolean>;
  read(): Promise<Buffer | null>;
  release(): Promise<void>;
}

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const DEFAULT_FRAMES_PER_SECOND = 15;
const DEFAULT_START_TIMEOUT_MS = 10_000;
const DEFAULT_READ_TIMEOUT_MS = 5000;
const DEFAULT_FORCE_KILL_TIMEOUT_MS = 3000;
const DEFAULT_MAX_BUFFER_BYTES = 5 * 1024 * 1024;

export type CommandFactoryOptions = {
  input: string;
  framesPerSecond: number;
  inputArgs?: string[];
  rtspTransport?: string;
};

export type VideoSourceOptions = {
  input: string;
  camera: string;
  framesPerSecond?: number;
  rtspTransport?: string;
  inputArgs?: string[];
  startTimeoutMs?: number;
  readTimeoutMs?: number;
  forceKillTimeoutMs?: number;
  maxBufferBytes?: number;
  commandFactory?: (options: CommandFactoryOptions) => ffmpeg.FfmpegCommand;
};

export type RtspErrorClass = 'timeout' | 'auth' | 'notFound' | 'network' | 'other';

export type SourceClosedEvent = {
  camera: string;
  reason: string;
  rtspError: RtspErrorClass | null;
  error: Error | null;
};

type FrameWaiter = (frame: Buffer | null) => void;

export class VideoSource extends EventEmitter implements FrameSource {
  private command: ffmpeg.FfmpegCommand | null = null;
  private commandCleanup: (() => void) | null = null;
  private commandExit: Promise<void> | null = null;
  private stream: Readable | null = null;
  private streamCleanup: (() => void) | null = null;
  private buffer: Buffer = Buffer.alloc(0);
  private latestFrame: Buffer | null = null;
  private readonly waiters = new Set<FrameWaiter>();
  private opened = false;
  private alive = false;
  private rtspError: RtspErrorClass | null = null;
  private droppedFrames = 0;

  constructor(private readonly options: VideoSourceOptions) {
    super();
  }

  isOpened() {
    return this.opened && this.alive;
  }

  async open(): Promise<boolean> {
    if (this.isOpened()) {
      return true;
    }
    if (this.command) {
      await this.release();
    }

    this.rtspError = null;
    this.latestFrame = null;

    try {
      this.startCommand();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.markClosed('start-error', err);
      await this.release();
      return false;
    }

    const first = await this.waitForFrame(this.options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS);
    if (!first) {
      if (this.alive) {
        this.markClosed('start-timeout');
      }
      await this.release();
      return false;
    }

    this.latestFrame = first;
    this.opened = true;
    return true;
  }

  async read(): Promise<Buffer | null> {
    if (!this.isOpened()) {
      return null;
    }

    const pending = this.latestFrame;
    if (pending) {
      this.latestFrame = null;
      return pending;
    }

    const frame = await this.waitForFrame(this.options.readTimeoutMs ?? DEFAULT_READ_TIMEOUT_MS);
    if (!frame && this.alive) {
      this.markClosed('read-timeout');
    }
    return frame;
  }

  async release(): Promise<void> {
    this.opened = false;
    this.alive = false;
    this.latestFrame = null;
    this.resolveWaiters(null);
    this.cleanupStream();

    const command = this.command;
    const exit = this.commandExit;
    this.command = null;
    this.commandExit = null;
    this.commandCleanup?.();
    this.commandCleanup = null;

    if (!command) {
      return;
    }

    killCommand(command, 'SIGTERM');
    const forceKillTimeoutMs = this.options.forceKillTimeoutMs ?? DEFAULT_FORCE_KILL_TIMEOUT_MS;
    const forceKill = new AbortController();
    let exited = false;
    await Promise.race([
      (exit ?? Promise.resolve()).then(() => {
        exited = true;
      }),
      delay(forceKillTimeoutMs, forceKill.signal)
    ]);
    forceKill.abort();
    if (!exited) {
      killCommand(command, 'SIGKILL');
    }
  }

  getDroppedFrames() {
    return this.droppedFrames;
  }

  consume(stream: Readable) {
    this.cleanupStream();
    this.stream = stream;
    this.buffer = Buffer.alloc(0);

    const onData = (chunk: Buffer) => {
      this.buffer = Buffer.concat([this.buffer, chunk]);
      const { frames, remainder, corrupted } = this.extractFrames(this.buffer);
      this.buffer = remainder;

      for (const frame of frames) {
        this.deliver(frame);
      }

      if (corrupted) {
        this.buffer = Buffer.alloc(0);
        this.markClosed('corrupted-frame', new Error('Corrupted frame encountered'));
      }
    };

    const onError = (err: Error) => {
      this.markClosed('stream-error', err);
    };

    const onClose = () => {
      this.markClosed('stream-closed');
    };

    stream.on('data', onData);
    stream.once('error', onError);
    stream.once('end', onClose);
    stream.once('close', onClose);

    this.streamCleanup = () => {
      stream.off('data', onData);
      stream.off('error', onError);
      stream.off('end', onClose);
      stream.off('close', onClose);
    };
  }

  private startCommand() {
    const command = this.createCommand();
    this.command = command;
    this.alive = true;

    let resolveExit: () => void = () => {};
    this.commandExit = new Promise<void>(resolve => {
      resolveExit = resolve;
    });
    // Stays attached after release: fluent-ffmpeg reports a killed process as an 'error'.
    command.on('error', () => resolveExit());
    command.once('end', () => resolveExit());

    const onError = (err: Error) => {
      this.markClosed('ffmpeg-error', err);
    };

    const onEnd = () => {
      this.markClosed('ffmpeg-ended');
    };

    const onStderr = (line: string) => {
      const classification = classifyRtspError(line);
      if (classification !== 'other') {
        this.rtspError = classification;
      }
    };

    command.once('error', onError);
    command.once('end', onEnd);
    command.on('stderr', onStderr);

    this.commandCleanup = () => {
      command.off('error', onError);
      command.off('end', onEnd);
      command.off('stderr', onStderr);
    };

    const output = command.pipe();
    if (!(output instanceof Readable)) {
      throw new Error('ffmpeg output is not readable');
    }
    this.consume(output);
  }

  private createCommand() {
    const framesPerSecond = this.options.framesPerSecond ?? DEFAULT_FRAMES_PER_SECOND;
    if (this.options.commandFactory) {
      return this.options.commandFactory({
        input: this.options.input,
        framesPerSecond,
        inputArgs: this.options.inputArgs,
        rtspTransport: this.options.rtspTransport
      });
    }

    const command = ffmpeg(this.options.input);

    const inputOptions: string[] = [];
    if (this.options.rtspTransport && isRtspInput(this.options.input)) {
      inputOptions.push('-rtsp_transport', this.options.rtspTransport);
    }

    if (this.options.inputArgs?.length) {
      inputOptions.push(...this.options.inputArgs);
    }

    if (inputOptions.length > 0) {
      command.inputOptions(inputOptions);
    }

    return command
      .outputOptions('-vf', `fps=${framesPerSecond}`)
      .outputOptions('-f', 'image2pipe')
      .outputOptions('-vcodec', 'png');
  }

  private deliver(frame: Buffer) {
    if (this.waiters.size > 0) {
      this.resolveWaiters(frame);
      return;
    }
    // Keep only the newest frame so a slow reader never processes stale video.
    if (this.latestFrame) {
      this.droppedFrames += 1;
      metrics.incrementCameraCounter(this.options.camera, 'droppedFrames');
    }
    this.latestFrame = frame;
  }

  private waitForFrame(timeoutMs: number): Promise<Buffer | null> {
    if (!this.alive) {
      return Promise.resolve(null);
    }

    return new Promise(resolve => {
      const waiter: FrameWaiter = frame => {
        clearTimeout(timer);
        this.waiters.delete(waiter);
        resolve(frame);
      };
      const timer = setTimeout(() => {
        waiter(null);
      }, Math.max(0, timeoutMs));
      this.waiters.add(waiter);
    });
  }

  private resolveWaiters(frame: Buffer | null) {
    for (const waiter of Array.from(this.waiters)) {
      waiter(frame);
    }
  }

  private markClosed(reason: string, error: Error | null = null) {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    this.opened = false;
    this.resolveWaiters(null);
    metrics.incrementCameraCounter(this.options.camera, `sourceClosed.${reason}`);
    const event: SourceClosedEvent = {
      camera: this.options.camera,
      reason,
      rtspError: this.rtspError,
      error
    };
    this.emit('closed', event);
  }

  private extractFrames(buffer: Buffer) {
    let working: Buffer = buffer;
    const frames: Buffer[] = [];
    let corrupted = false;
    const maxBuffer = this.options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

    while (true) {
      const pngStart = working.indexOf(PNG_SIGNATURE);

      if (pngStart === -1) {
        if (working.length > maxBuffer) {
          corrupted = true;
          working = Buffer.alloc(0);
        }
        break;
      }

      if (pngStart > 0) {
        working = working.subarray(pngStart);
      }

      const frame = slicePng(working);
      if (!frame) {
        if (working.length > maxBuffer) {
          corrupted = true;
          working = Buffer.alloc(0);
        }
        break;
      }

      frames.push(frame.png);
      working = frame.remainder;
    }

    return { frames, remainder: working, corrupted };
  }

  private cleanupStream() {
    if (!this.stream) {
      return;
    }

    this.streamCleanup?.();
    this.streamCleanup = null;

    if (!this.stream.destroyed) {
      this.stream.destroy();
    }

    this.stream = null;
    this.buffer = Buffer.alloc(0);
  }
}

function killCommand(command: ffmpeg.FfmpegCommand, signal: NodeJS.Signals) {
  // fluent-ffmpeg ignores kill() once the child process is gone.
  command.kill(signal);
}

function isRtspInput(input: string) {
  return /^rtsps?:\/\//i.test(input.trim());
}

const RTSP_TIMEOUT_PATTERNS = [/timed out/i, /timeout/i, /connection timed out/i];

const RTSP_AUTH_PATTERNS = [/401/i, /unauthorized/i, /authorization failed/i, /authentication/i];

const RTSP_NOT_FOUND_PATTERNS = [/404/i, /not found/i, /no such file/i];

const RTSP_CONNECTION_PATTERNS = [
  /connection refused/i,
  /network is unreachable/i,
  /could not connect/i,
  /broken pipe/i,
  /connection reset/i
];

export function classifyRtspError(stderrLine: string): RtspErrorClass {
  const line = stderrLine.trim();
  if (!line) {
    return 'other';
  }
  if (RTSP_AUTH_PATTERNS.some(pattern => pattern.test(line))) {
    return 'auth';
  }
  if (RTSP_NOT_FOUND_PATTERNS.some(pattern => pattern.test(line))) {
    return 'notFound';
  }
  if (RTSP_TIMEOUT_PATTERNS.some(pattern => pattern.test(line))) {
    return 'timeout';
  }
  if (RTSP_CONNECTION_PATTERNS.some(pattern => pattern.test(line))) {
    return 'network';
  }
  return 'other';
}

export type SliceResult = {
  png: Buffer;
  remainder: Buffer;
};

export function slicePng(buffer: Buffer): SliceResult | null {
  if (buffer.length < PNG_SIGNATURE.length) {
    return null;
  }

  if (!buffer.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)) {
    return null;
  }

  let offset = PNG_SIGNATURE.length;

  while (offset + 8 <= buffer.length) {
    const length = buffer.readUInt32BE(offset);
    const chunkType = buffer.toString('ascii', offset + 4, offset + 8);
    const chunkEnd = offset + 8 + length + 4;

    if (chunkEnd > buffer.length) {
      return null;
    }

    offset = chunkEnd;

    if (chunkType === 'IEND') {
      return {
        png: buffer.subarray(0, offset),
        remainder: buffer.subarray(offset)
      };
    }
  }

  return null;
}
