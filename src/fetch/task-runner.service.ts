import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import { AppLogger } from '../common/logger/app-logger.service';
import { readerConfig } from '../config/reader.config';
import { HttpFetcherService, TransportResponse } from './fetcher/http-fetcher.service';
import { decodeBody, resolveCharset } from './fetcher/charset';
import { describeError } from './fetcher/fetch-errors';
import { ExtractionStrategyResolver } from './extraction/extraction-strategy.resolver';
import { FetchOutcome, TaskState, TerminalTaskState } from './models/fetch-outcome.model';

export interface TaskOptions {
  timeoutMs: number;
  toMarkdown: boolean;
}

function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Runs one URL from fetch to a terminal outcome. Never rejects: every failure
 * is recorded on the returned FetchOutcome.
 */
@Injectable()
export class TaskRunnerService {
  private readonly logger = AppLogger.create(TaskRunnerService.name);

  constructor(
    private readonly fetcher: HttpFetcherService,
    private readonly strategies: ExtractionStrategyResolver,
    @Inject(readerConfig.KEY) private readonly config: ConfigType<typeof readerConfig>,
  ) {}

  async run(url: string, options: TaskOptions): Promise<FetchOutcome> {
    const startTime = Date.now();
    const outcome: FetchOutcome = {
      url,
      ok: false,
      status_code: null,
      charset: null,
      content: null,
      error: null,
      bytes_downloaded: null,
      elapsed_ms: 0,
    };
    const finish = (state: TerminalTaskState): FetchOutcome => {
      outcome.elapsed_ms = Date.now() - startTime;
      this.transition(url, state, { elapsedMs: outcome.elapsed_ms, error: outcome.error });
      return outcome;
    };

    this.transition(url, 'fetching');
    let response: TransportResponse;
    try {
      const result = await this.fetcher.fetch(url, options.timeoutMs);
      if (result.kind === 'failure') {
        outcome.error = `${result.reason}: ${result.message}`;
        return finish('fetch-failed');
      }
      response = result;
    } catch (error) {
      outcome.error = `other-transport-error: ${describeError(error)}`;
      return finish('fetch-failed');
    }

    outcome.status_code = response.statusCode;
    outcome.bytes_downloaded = response.bytesReceived;
    const { charset } = resolveCharset(response.contentType, response.body);
    outcome.charset = charset;

    if (!isSuccessStatus(response.statusCode)) {
      outcome.error = response.statusText
        ? `HTTP ${response.statusCode} ${response.statusText}`
        : `HTTP ${response.statusCode}`;
      return finish('fetched-non-2xx');
    }
    this.transition(url, 'fetched', { statusCode: response.statusCode });

    this.transition(url, 'extracting');
    try {
      outcome.content = this.extract(response, charset, options);
      outcome.ok = true;
      return finish('done');
    } catch (error) {
      outcome.content = null;
      outcome.error = `extraction failed: ${describeError(error)}`;
      return finish('extract-failed');
    }
  }

  // Links and site profiles follow the page's final address, not the requested one
  private extract(response: TransportResponse, charset: string, options: TaskOptions): string {
    this.assertSupportedContentType(response.contentType);

    const html = decodeBody(response.body, charset);
    return this.strategies
      .resolve(options.toMarkdown, response.finalUrl)
      .extract(html, response.finalUrl);
  }

  private assertSupportedContentType(contentType: string | null): void {
    const allowed = this.config.allowedContentTypes;
    if (!contentType || allowed.length === 0) return;

    const lowered = contentType.toLowerCase();
    if (!allowed.some((keyword) => lowered.includes(keyword))) {
      throw new Error(`Unsupported content type: ${contentType}`);
    }
  }

  private transition(url: string, state: TaskState, details: Record<string, unknown> = {}): void {
    this.logger.debug('Task state changed', {
      event: 'task_state',
      url,
      state,
      ...details,
    });
  }
}
