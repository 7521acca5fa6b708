import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { AxiosResponse } from 'axios';
import { addAbortSignal, Readable } from 'node:stream';
import { AppLogger } from '../../common/logger/app-logger.service';
import { parseHttpUrl } from '../../common/http-url.util';
import { readerConfig } from '../../config/reader.config';
import { FetchHttpClient } from './fetch-http.client';
import { classifyTransportError, describeError, FetchFailureReason } from './fetch-errors';

export interface TransportResponse {
  kind: 'response';
  statusCode: number;
  statusText: string;
  contentType: string | null;
  /** At most `maxBodyBytes` leading bytes of the decompressed body. */
  body: Buffer;
  /** Size of the whole decompressed body, including any bytes cut from `body`. */
  bytesReceived: number;
  /** URL of the last hop after redirects. */
  finalUrl: string;
}

export interface TransportFailure {
  kind: 'failure';
  reason: FetchFailureReason;
  message: string;
}

export type TransportResult = TransportResponse | TransportFailure;

interface CappedBody {
  body: Buffer;
  bytesReceived: number;
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  if (data instanceof Uint8Array) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
  if (typeof data === 'string') return Buffer.from(data, 'utf-8');
  return Buffer.alloc(0);
}

/**
 * Reads the whole body but keeps only the first `maxBytes`. The stream is
 * destroyed if `signal` aborts mid-read.
 */
async function readCappedBody(
  data: unknown,
  maxBytes: number,
  signal: AbortSignal,
): Promise<CappedBody> {
  if (!(data instanceof Readable)) {
    const whole = toBuffer(data);
    return { body: whole.subarray(0, maxBytes), bytesReceived: whole.length };
  }

  addAbortSignal(signal, data);
  const chunks: Buffer[] = [];
  let kept = 0;
  let bytesReceived = 0;
  for await (const chunk of data) {
    const buffer = toBuffer(chunk);
    bytesReceived += buffer.length;
    if (kept < maxBytes) {
      const slice = buffer.subarray(0, maxBytes - kept);
      chunks.push(slice);
      kept += slice.length;
    }
  }
  return { body: Buffer.concat(chunks), bytesReceived };
}

function headerValue(response: AxiosResponse, name: string): string | null {
  const value: unknown = response.headers[name];
  return typeof value === 'string' ? value : null;
}

/**
 * One GET per call, bounded by a single deadline that covers connect, every
 * redirect hop and the body read. Any status code is a successful transport
 * result.
 */
@Injectable()
export class HttpFetcherService {
  private readonly logger = AppLogger.create(HttpFetcherService.name);

  constructor(
    private readonly httpClient: FetchHttpClient,
    @Inject(readerConfig.KEY) private readonly config: ConfigType<typeof readerConfig>,
  ) {}

  async fetch(url: string, timeoutMs: number): Promise<TransportResult> {
    const startTime = Date.now();

    if (!parseHttpUrl(url)) {
      return { kind: 'failure', reason: 'invalid-url', message: `Invalid URL: ${url}` };
    }

    const signal = AbortSignal.timeout(timeoutMs);

    try {
      const response = await this.httpClient.get(url, { signal });
      const { body, bytesReceived } = await readCappedBody(
        response.data,
        this.config.maxBodyBytes,
        signal,
      );

      if (bytesReceived > body.length) {
        this.logger.debug('Response body truncated', {
          event: 'fetch_body_truncated',
          url,
          bytesReceived,
          bytesKept: body.length,
        });
      }

      this.logger.debug('URL fetched', {
        event: 'fetch_success',
        url,
        statusCode: response.status,
        bytes: bytesReceived,
        durationMs: Date.now() - startTime,
      });

      return {
        kind: 'response',
        statusCode: response.status,
        statusText: response.statusText ?? '',
        contentType: headerValue(response, 'content-type'),
        body,
        bytesReceived,
        finalUrl: response.config.url ?? url,
      };
    } catch (error) {
      const reason = classifyTransportError(error, signal.aborted);
      const message =
        reason === 'timeout' ? `no response within ${timeoutMs} ms` : describeError(error);

      this.logger.warn('Error fetching URL', {
        event: 'fetch_error',
        url,
        reason,
        error: message,
        durationMs: Date.now() - startTime,
      });

      return { kind: 'failure', reason, message };
    }
  }
}
