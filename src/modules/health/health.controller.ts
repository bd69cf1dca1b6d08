import { Controller, Get } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import { DatabaseService } from '../database/database.service';

@Controller('health')
export class HealthController {
  constructor(
    private readonly database: DatabaseService,
    private readonly appConfig: AppConfigService,
  ) {}

  @Get()
  async health() {
    const now = new Date();
    const uptimeSeconds = Math.max(0, Math.floor(process.uptime()));
    const config = {
      nodeEnv: this.appConfig.nodeEnv(),
      storageConfigured: Boolean(this.appConfig.s3()),
    };

    const startedAt = Date.now();
    try {
      // Readiness-style check: the database can execute a trivial query.
      await this.database.ping();
      return {
        data: {
          status: 'ok',
          nowIso: now.toISOString(),
          uptimeSeconds,
          service: 'microblog-api',
          config,
          db: { status: 'ok', latencyMs: Date.now() - startedAt },
        },
      };
    } catch (err) {
      return {
        data: {
          status: 'degraded',
          nowIso: now.toISOString(),
          uptimeSeconds,
          service: 'microblog-api',
          config,
          db: {
            status: 'down',
            latencyMs: Date.now() - startedAt,
            error: err instanceof Error ? err.message : String(err),
          },
        },
      };
    }
  }
}
