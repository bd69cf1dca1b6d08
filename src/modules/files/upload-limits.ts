import type { MulterModuleOptions } from '@nestjs/platform-express';
import type { AppConfigService } from '../app/app-config.service';

/** Multer rejects oversized parts while they stream in, before they are buffered whole. */
export function uploadMulterOptions(cfg: AppConfigService): MulterModuleOptions {
  return {
    limits: {
      fileSize: cfg.uploadMaxBytes(),
      files: cfg.uploadMaxFiles(),
    },
  };
}
