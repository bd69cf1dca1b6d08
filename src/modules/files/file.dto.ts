import { publicAssetUrl } from '../../common/assets/public-asset-url';
import type { FileRecord } from './file.types';

export type FileResponseDto = {
  id: number;
  createdAt: string;
  filename: string;
  contentType: string;
  size: number;
  /** Null when no public asset base URL is configured. */
  url: string | null;
};

export function toFileResponseDto(file: FileRecord, publicBaseUrl: string | null = null): FileResponseDto {
  return {
    id: file.id,
    createdAt: file.createdAt.toISOString(),
    filename: file.originalFilename,
    contentType: file.contentType,
    size: file.size,
    url: publicAssetUrl({ publicBaseUrl, key: file.storageKey }),
  };
}
