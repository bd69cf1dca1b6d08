import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { AppConfigService } from '../app/app-config.service';
import { KeyValueStore, type SetOptions } from './key-value-store';

@Injectable()
export class RedisService extends KeyValueStore implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private readonly client: Redis;

  constructor(cfg: AppConfigService) {
    super();
    this.client = new Redis(cfg.redisUrl(), {
      // Prefer failing fast on long outages rather than hanging requests indefinitely.
      maxRetriesPerRequest: 2,
      enableReadyCheck: true,
    });

    this.client.on('error', (err: Error) => {
      // ioredis can emit frequent transient errors during reconnects.
      this.logger.warn(`Redis error: ${err.message}`);
    });
  }

  async getString(key: string): Promise<string | null> {
    const k = (key ?? '').trim();
    if (!k) return null;
    const v = await this.client.get(k);
    return v ?? null;
  }

  async setString(key: string, value: string, opts?: SetOptions): Promise<boolean> {
    const k = (key ?? '').trim();
    if (!k) return false;
    const v = String(value ?? '');
    const ttlMs =
      typeof opts?.ttlMs === 'number' && Number.isFinite(opts.ttlMs) && opts.ttlMs > 0
        ? Math.floor(opts.ttlMs)
        : null;
    const ttlSeconds =
      !ttlMs && typeof opts?.ttlSeconds === 'number' && Number.isFinite(opts.ttlSeconds) && opts.ttlSeconds > 0
        ? Math.floor(opts.ttlSeconds)
        : null;
    const nx = opts?.onlyIfAbsent === true;

    if (ttlMs) {
      const res = await (nx ? this.client.set(k, v, 'PX', ttlMs, 'NX') : this.client.set(k, v, 'PX', ttlMs));
      return res === 'OK';
    }
    if (ttlSeconds) {
      const res = await (nx ? this.client.set(k, v, 'EX', ttlSeconds, 'NX') : this.client.set(k, v, 'EX', ttlSeconds));
      return res === 'OK';
    }
    const res = await (nx ? this.client.set(k, v, 'NX') : this.client.set(k, v));
    return res === 'OK';
  }

  async del(...keys: Array<string | null | undefined>): Promise<number> {
    const ks = keys.map((k) => (k ?? '').trim()).filter(Boolean);
    if (ks.length === 0) return 0;
    return await this.client.del(...ks);
  }

  async incr(key: string): Promise<number> {
    return await this.client.incr(key);
  }

  async onModuleDestroy() {
    try {
      await this.client.quit();
    } catch {
      this.client.disconnect();
    }
  }
}
