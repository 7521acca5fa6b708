import { Module } from "@nestjs/common";
import { FetchController } from "./fetch.controller";
import { BatchOrchestratorService } from "./batch-orchestrator.service";
import { TaskRunnerService } from "./task-runner.service";
import { HttpFetcherService } from "./fetcher/http-fetcher.service";
import { FetchHttpClient } from "./fetcher/fetch-http.client";
import { ExtractionStrategyResolver } from "./extraction/extraction-strategy.resolver";
import { PlainTextExtractor } from "./extraction/plain-text.extractor";
import { GenericMarkdownExtractor } from "./extraction/generic-markdown.extractor";
import { EncyclopediaMarkdownExtractor } from "./extraction/encyclopedia-markdown.extractor";

@Module({
    controllers: [FetchController],
    providers: [
        BatchOrchestratorService,
        TaskRunnerService,
        HttpFetcherService,
        FetchHttpClient,
        ExtractionStrategyResolver,
        PlainTextExtractor,
        GenericMarkdownExtractor,
        EncyclopediaMarkdownExtractor,
    ],
})
export class FetchModule {}
