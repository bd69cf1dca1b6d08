import { DeleteObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { Injectable, ServiceUnavailableException } from '@nestjs/common';
import { AppConfigService } from '../app/app-config.service';
import { FileStorage } from './file-storage';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isNotFoundLikeS3Error(err: unknown): boolean {
  // AWS SDK v3 errors vary by runtime; check common signals.
  if (!isRecord(err)) return false;
  const code = String(err.name ?? err.Code ?? err.code ?? '').toLowerCase();
  const metadata = isRecord(err.$metadata) ? err.$metadata : null;
  const status = Number(metadata?.httpStatusCode ?? NaN);
  return code.includes('notfound') || code.includes('nosuchkey') || status === 404;
}

@Injectable()
export class S3FileStorage extends FileStorage {
  private readonly s3: S3Client | null;
  private readonly bucket: string | null;

  constructor(appConfig: AppConfigService) {
    super();
    const cfg = appConfig.s3();
    if (!cfg) {
      this.s3 = null;
      this.bucket = null;
      return;
    }

    this.bucket = cfg.bucket;
    this.s3 = new S3Client({
      region: cfg.region,
      ...(cfg.endpoint ? { endpoint: cfg.endpoint, forcePathStyle: true } : {}),
      credentials: {
        accessKeyId: cfg.accessKeyId,
        secretAccessKey: cfg.secretAccessKey,
      },
    });
  }

  private requireS3() {
    if (!this.s3 || !this.bucket) {
      throw new ServiceUnavailableException('File storage is not configured yet.');
    }
    return { s3: this.s3, bucket: this.bucket };
  }

  async put(key: string, bytes: Buffer, contentType: string): Promise<void> {
    const { s3, bucket } = this.requireS3();
    await s3.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: bytes,
        ContentType: contentType,
        CacheControl: 'public, max-age=31536000, immutable',
      }),
    );
  }

  async delete(key: string): Promise<void> {
    const { s3, bucket } = this.requireS3();
    try {
      await s3.send(new DeleteObjectCommand({ Bucket: bucket, Key: key }));
    } catch (err) {
      if (isNotFoundLikeS3Error(err)) return;
      throw err;
    }
  }
}
