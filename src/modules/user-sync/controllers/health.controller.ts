import { Controller, Get, HttpStatus, HttpCode } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { ApiHealthCheck, ApiReadinessCheck } from '../../../_shared';
import { UserSyncService } from '../services/user-sync.service';

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(private readonly userSyncService: UserSyncService) {}

  @Get()
  @HttpCode(HttpStatus.OK)
  @ApiHealthCheck()
  health(): {
    status: string;
    timestamp: Date;
    uptime: number;
  } {
    return {
      status: 'healthy',
      timestamp: new Date(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<{
    status: 'ready' | 'not_ready';
    checks: { storage: boolean };
  }> {
    const storage = await this.userSyncService.isStorageHealthy();

    return {
      status: storage ? 'ready' : 'not_ready',
      checks: { storage },
    };
  }
}
