import { Controller, Get } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiResponse } from '@nestjs/swagger';
import {
  HealthCheck,
  HealthCheckService,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { CheckHealthUseCase } from '../../application/use-cases/check-health.use-case';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly checkHealthUseCase: CheckHealthUseCase,
  ) {}

  @Get()
  @HealthCheck()
  @ApiOperation({ summary: 'Health check for the configured sales source' })
  @ApiResponse({ status: 200, description: 'Sales source reachable' })
  @ApiResponse({ status: 503, description: 'Sales source unreachable' })
  check() {
    return this.health.check([
      async (): Promise<HealthIndicatorResult> => {
        const status = await this.checkHealthUseCase.execute();
        return {
          [`sales-${status.source}`]: {
            status: status.healthy ? 'up' : 'down',
          },
        };
      },
    ]);
  }
}
