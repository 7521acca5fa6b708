import { Body, Controller, HttpCode, HttpStatus, Post } from "@nestjs/common";
import { FetchRequestDto } from "./dto/fetch-request.dto";
import { BatchOrchestratorService } from "./batch-orchestrator.service";
import { BatchResult } from "./models/fetch-outcome.model";

@Controller('fetch')
export class FetchController {
    constructor(private readonly orchestrator: BatchOrchestratorService) {}

    // 200 even when individual URLs fail; per-item errors live in the results
    @Post()
    @HttpCode(HttpStatus.OK)
    async fetch(@Body() fetchRequestDto: FetchRequestDto): Promise<BatchResult> {
        return this.orchestrator.execute(fetchRequestDto);
    }
}
