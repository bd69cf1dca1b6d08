import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export type NodeEnv = 'development' | 'test' | 'production';

export type S3Config = {
  bucket: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
  // Optional: custom endpoint for S3-compatible stores (R2, MinIO).
  endpoint?: string;
};

const DEFAULT_UPLOAD_MAX_BYTES = 12 * 1024 * 1024; // 12MB per attachment

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);

  constructor(private readonly config: ConfigService) {}

  private readBool(key: string, fallback: boolean): boolean {
    const raw = this.config.get<string>(key);
    if (raw == null) return fallback;
    const v = String(raw).trim().toLowerCase();
    if (!v) return fallback;
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
    return fallback;
  }

  private readPositiveInt(key: string, fallback: number): number {
    const raw = this.config.get<string>(key) ?? '';
    const n = Number(raw);
    return raw.trim() && Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
  }

  nodeEnv(): NodeEnv {
    const raw = (this.config.get<string>('NODE_ENV') ?? 'development').trim();
    return raw === 'production' || raw === 'test' ? raw : 'development';
  }

  isProd(): boolean {
    return this.nodeEnv() === 'production';
  }

  port(): number {
    return this.readPositiveInt('PORT', 3001);
  }

  databaseUrl(): string {
    return (this.config.get<string>('DATABASE_URL') ?? '').trim();
  }

  dbPoolMax(): number {
    return this.readPositiveInt('DB_POOL_MAX', 10);
  }

  dbLogQueries(): boolean {
    return this.readBool('DB_LOG_QUERIES', false);
  }

  /** Number of connection attempts on startup (default 20). */
  dbConnectRetries(): number {
    return this.readPositiveInt('DB_CONNECT_RETRIES', 20);
  }

  /** Delay in ms between connection attempts (default 500). */
  dbConnectRetryDelayMs(): number {
    return this.readPositiveInt('DB_CONNECT_RETRY_DELAY_MS', 500);
  }

  redisUrl(): string {
    return (this.config.get<string>('REDIS_URL') ?? 'redis://localhost:6379').trim() || 'redis://localhost:6379';
  }

  logRequests(): boolean {
    return this.readBool('LOG_REQUESTS', false);
  }

  trustProxy(): boolean {
    return this.readBool('TRUST_PROXY', false);
  }

  allowedOrigins(): string[] {
    const raw = this.config.get<string>('ALLOWED_ORIGINS') ?? '';
    return raw
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }

  isOriginAllowed(origin: string): boolean {
    return this.allowedOrigins().includes(origin);
  }

  logCorsBlocked(origin: string) {
    this.logger.warn(
      `CORS blocked origin: ${origin}. Allowed origins: ${this.allowedOrigins().join(', ') || '(none)'}`,
    );
  }

  sessionHmacSecret(): string {
    // env schema enforces a real secret in production
    return this.config.get<string>('SESSION_HMAC_SECRET') ?? 'dev-session-secret-change-me';
  }

  s3(): S3Config | null {
    const bucket = this.config.get<string>('S3_BUCKET')?.trim() ?? '';
    const region = this.config.get<string>('S3_REGION')?.trim() || 'auto';
    const accessKeyId = this.config.get<string>('S3_ACCESS_KEY_ID')?.trim() ?? '';
    const secretAccessKey = this.config.get<string>('S3_SECRET_ACCESS_KEY')?.trim() ?? '';
    const endpoint = this.config.get<string>('S3_ENDPOINT')?.trim() ?? '';

    if (!bucket || !accessKeyId || !secretAccessKey) return null;
    const cfg: S3Config = { bucket, region, accessKeyId, secretAccessKey };
    if (endpoint) cfg.endpoint = endpoint;
    return cfg;
  }

  assetsPublicBaseUrl(): string | null {
    const v = this.config.get<string>('ASSETS_PUBLIC_BASE_URL')?.trim() ?? '';
    return v ? v : null;
  }

  uploadMaxBytes(): number {
    return this.readPositiveInt('UPLOAD_MAX_BYTES', DEFAULT_UPLOAD_MAX_BYTES);
  }

  uploadMaxFiles(): number {
    return this.readPositiveInt('UPLOAD_MAX_FILES', 10);
  }

  cachePostsTtlSeconds(): number {
    return this.readPositiveInt('CACHE_POSTS_TTL_SECONDS', 60);
  }

  rateLimitTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_TTL_SECONDS', 60);
  }

  rateLimitLimit(): number {
    // Pretty generous default.
    return this.readPositiveInt('RATE_LIMIT_LIMIT', 600);
  }

  rateLimitPostWriteLimit(): number {
    return this.readPositiveInt('RATE_LIMIT_POST_WRITE_LIMIT', 30);
  }

  rateLimitPostWriteTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_POST_WRITE_TTL_SECONDS', 60);
  }

  /** Follow/unfollow. */
  rateLimitInteractLimit(): number {
    return this.readPositiveInt('RATE_LIMIT_INTERACT_LIMIT', 180);
  }

  rateLimitInteractTtlSeconds(): number {
    return this.readPositiveInt('RATE_LIMIT_INTERACT_TTL_SECONDS', 60);
  }
}
