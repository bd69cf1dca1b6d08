import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import { AppConfigService } from '../app/app-config.service';
import type { Blog } from '../blogs/blog.types';
import { FileStorage } from './file-storage';
import type { FileRecord, UploadedFilePart } from './file.types';
import { FilesRepository } from './files.repository';

const EXT_BY_CONTENT_TYPE: Readonly<Record<string, string>> = {
  'image/jpeg': 'jpg',
  'image/png': 'png',
  'image/webp': 'webp',
  'image/gif': 'gif',
  'video/mp4': 'mp4',
  // iOS commonly uploads .mov as video/quicktime
  'video/quicktime': 'mov',
  'video/webm': 'webm',
};

export function extForContentType(contentType: string): string | null {
  return EXT_BY_CONTENT_TYPE[(contentType ?? '').trim().toLowerCase()] ?? null;
}

function cleanFilename(name: string): string {
  const base = String(name ?? '')
    .split(/[\\/]/)
    .pop()
    ?.trim();
  return (base || 'upload').slice(0, 255);
}

/** Attachment bytes go to FileStorage; metadata rows go to FilesRepository. */
@Injectable()
export class FilesService {
  private readonly logger = new Logger(FilesService.name);

  constructor(
    private readonly files: FilesRepository,
    private readonly storage: FileStorage,
    private readonly appConfig: AppConfigService,
  ) {}

  private objectKey(blogId: number, ext: string): string {
    return `blogs/${blogId}/${randomUUID()}.${ext}`;
  }

  /** Throws the same 400 that `createFile` would, without writing anything. */
  validate(upload: UploadedFilePart): { contentType: string; ext: string } {
    const contentType = (upload.mimetype ?? '').trim().toLowerCase();
    const ext = extForContentType(contentType);
    if (!ext) throw new BadRequestException(`Unsupported file type: ${contentType || 'unknown'}.`);
    const size = upload.buffer?.length ?? 0;
    if (size === 0) throw new BadRequestException('Uploaded file is empty.');
    if (size > this.appConfig.uploadMaxBytes()) throw new BadRequestException('Uploaded file is too large.');
    return { contentType, ext };
  }

  async createFile(upload: UploadedFilePart, blog: Blog): Promise<FileRecord> {
    const { contentType, ext } = this.validate(upload);
    const storageKey = this.objectKey(blog.id, ext);
    await this.storage.put(storageKey, upload.buffer, contentType);
    const file = await this.files.create({
      blogId: blog.id,
      storageKey,
      originalFilename: cleanFilename(upload.originalname),
      contentType,
      size: upload.buffer.length,
    });
    this.logger.debug(`Stored file id=${file.id} key=${storageKey} bytes=${file.size}`);
    return file;
  }

  async getFile(id: number): Promise<FileRecord> {
    const file = await this.files.findById(id);
    if (!file) throw new NotFoundException(`File with id ${id} is not found.`);
    return file;
  }

  /**
   * Deletes the metadata row only. The stored object stays until the caller's transaction has
   * committed and it passes the key to `deleteObjects`.
   */
  async deleteFile(id: number): Promise<FileRecord> {
    const file = await this.getFile(id);
    await this.files.delete(file.id);
    return file;
  }

  /** Best-effort: a failed object delete is logged, since the rows are already gone. */
  async deleteObjects(storageKeys: ReadonlyArray<string>): Promise<void> {
    for (const key of storageKeys) {
      try {
        await this.storage.delete(key);
        this.logger.debug(`Deleted stored object key=${key}`);
      } catch (err) {
        this.logger.warn(`Failed to delete stored object key=${key}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }
}
