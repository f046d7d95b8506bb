import { Controller, Get } from '@nestjs/common';
import { AnalysisOrchestrator } from '../../../application';

@Controller('health')
export class HealthController {
  constructor(private readonly orchestrator: AnalysisOrchestrator) {}

  @Get()
  check(): { status: 'ok'; timestamp: string; inFlight: number } {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      inFlight: this.orchestrator.inFlightCount,
    };
  }
}
