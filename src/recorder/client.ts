export type TrackOperation = 'start' | 'stop';

export type TrackResponse = {
  status: number;
};

export interface RecorderClient {
  startTrack(trackId: number): Promise<TrackResponse>;
  stopTrack(trackId: number): Promise<TrackResponse>;
}

export class RecorderRequestError extends Error {
  constructor(
    message: string,
    readonly operation: TrackOperation,
    readonly trackId: number,
    readonly status: number | null,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RecorderRequestError';
  }
}

export type IsapiRecorderClientOptions = {
  host: string;
  user: string;
  password: string;
  protocol?: 'http' | 'https';
  requestTimeoutMs?: number;
  fetch?: typeof fetch;
};

const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
const MAX_ERROR_BODY_LENGTH = 200;

/**
 * Manual record control over the recorder's ISAPI endpoints. Any 2xx answer
 * is a success; other statuses, network failures and timeouts reject with
 * {@link RecorderRequestError}.
 */
export class IsapiRecorderClient implements RecorderClient {
  private readonly fetchImpl: typeof fetch;
  private readonly authorization: string;

  constructor(private readonly options: IsapiRecorderClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    const credentials = Buffer.from(`${options.user}:${options.password}`).toString('base64');
    this.authorization = `Basic ${credentials}`;
  }

  buildUrl(operation: TrackOperation, trackId: number): string {
    const protocol = this.options.protocol ?? 'http';
    return `${protocol}://${this.options.host}/ISAPI/ContentMgmt/record/control/manual/${operation}/tracks/${trackId}`;
  }

  startTrack(trackId: number): Promise<TrackResponse> {
    return this.send('start', trackId);
  }

  stopTrack(trackId: number): Promise<TrackResponse> {
    return this.send('stop', trackId);
  }

  private async send(operation: TrackOperation, trackId: number): Promise<TrackResponse> {
    const url = this.buildUrl(operation, trackId);
    const timeoutMs = this.options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'PUT',
        headers: { authorization: this.authorization },
        signal: AbortSignal.timeout(timeoutMs)
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `timed out after ${timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      throw new RecorderRequestError(
        `${operation} track ${trackId} failed: ${reason}`,
        operation,
        trackId,
        null,
        { cause: error }
      );
    }

    const body = await response.text().catch(() => '');

    if (!response.ok) {
      const detail = body.trim().slice(0, MAX_ERROR_BODY_LENGTH);
      throw new RecorderRequestError(
        `${operation} track ${trackId} failed: HTTP ${response.status}${detail ? ` ${detail}` : ''}`,
        operation,
        trackId,
        response.status
      );
    }

    return { status: response.status };
  }
}
