import { BadRequestException, Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import pLimit from 'p-limit';
import { AppLogger } from '../common/logger/app-logger.service';
import { MAX_URLS_PER_REQUEST } from '../common/constants';
import { readerConfig } from '../config/reader.config';
import { FetchRequestDto } from './dto/fetch-request.dto';
import {
  BatchResult,
  FetchOutcome,
  ResolvedFetchRequest,
  TaskState,
} from './models/fetch-outcome.model';
import { TaskRunnerService } from './task-runner.service';

const PENDING: TaskState = 'pending';

@Injectable()
export class BatchOrchestratorService {
  private readonly logger = AppLogger.create(BatchOrchestratorService.name);

  constructor(
    private readonly taskRunner: TaskRunnerService,
    @Inject(readerConfig.KEY) private readonly config: ConfigType<typeof readerConfig>,
  ) {}

  /**
   * Applies configured defaults and the bounds that depend on configuration.
   * Throws before anything is dispatched.
   */
  resolve(dto: FetchRequestDto): ResolvedFetchRequest {
    const { urls } = dto;
    if (urls.length === 0 || urls.length > MAX_URLS_PER_REQUEST) {
      throw new BadRequestException(
        `urls must contain between 1 and ${MAX_URLS_PER_REQUEST} items`,
      );
    }

    const requested = dto.concurrency ?? this.config.defaultConcurrency;
    if (requested > this.config.maxConcurrency) {
      throw new BadRequestException(
        `concurrency must be between 1 and ${this.config.maxConcurrency}`,
      );
    }

    const timeoutSeconds = dto.timeout ?? this.config.defaultTimeout;

    return Object.freeze({
      urls: Object.freeze([...urls]),
      timeoutMs: Math.round(timeoutSeconds * 1000),
      concurrency: Math.min(requested, urls.length),
      toMarkdown: dto.to_markdown ?? true,
    });
  }

  async execute(dto: FetchRequestDto): Promise<BatchResult> {
    const request = this.resolve(dto);
    const { urls, concurrency } = request;

    this.logger.info('Batch fetch started', {
      event: 'fetch_batch_start',
      urlCount: urls.length,
      concurrency,
      timeoutMs: request.timeoutMs,
      toMarkdown: request.toMarkdown,
    });

    const startTime = Date.now();
    const limit = pLimit(concurrency);
    // One slot per input URL; each task writes only its own index
    const results = new Array<FetchOutcome>(urls.length);

    const tasks = urls.map((url, index) => {
      this.logger.debug('Task queued', { event: 'task_state', url, state: PENDING });
      return limit(async () => {
        results[index] = await this.taskRunner.run(url, {
          timeoutMs: request.timeoutMs,
          toMarkdown: request.toMarkdown,
        });
      });
    });
    await Promise.all(tasks);

    const elapsedMs = Date.now() - startTime;
    const successCount = results.filter((r) => r.ok).length;

    this.logger.info('Batch fetch completed', {
      event: 'fetch_batch_complete',
      urlCount: urls.length,
      successCount,
      errorCount: results.length - successCount,
      durationMs: elapsedMs,
    });

    return {
      total: urls.length,
      concurrency,
      elapsed_ms: elapsedMs,
      results,
    };
  }
}
