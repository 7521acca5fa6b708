import { Controller, Get } from "@nestjs/common";

@Controller('health')
export class HealthController {
    // Liveness only; does not touch the fetch pipeline
    @Get()
    check(): { status: 'ok' } {
        return { status: 'ok' };
    }
}
