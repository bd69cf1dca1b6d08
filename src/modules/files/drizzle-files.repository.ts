import { Injectable } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { files, type FileRow } from '../database/schema';
import type { FileRecord, NewFileRecord } from './file.types';
import { FilesRepository } from './files.repository';

export function toFileRecord(row: FileRow): FileRecord {
  return {
    id: row.id,
    createdAt: row.createdAt,
    blogId: row.blogId,
    storageKey: row.storageKey,
    originalFilename: row.originalFilename,
    contentType: row.contentType,
    size: row.size,
  };
}

@Injectable()
export class DrizzleFilesRepository extends FilesRepository {
  constructor(private readonly database: DatabaseService) {
    super();
  }

  async findById(id: number): Promise<FileRecord | null> {
    const [row] = await this.database.client().select().from(files).where(eq(files.id, id)).limit(1);
    return row ? toFileRecord(row) : null;
  }

  async create(file: NewFileRecord): Promise<FileRecord> {
    const [row] = await this.database.client().insert(files).values(file).returning();
    if (!row) throw new Error('File insert returned no row.');
    return toFileRecord(row);
  }

  async delete(id: number): Promise<void> {
    // post_attachments rows cascade.
    await this.database.client().delete(files).where(eq(files.id, id));
  }
}
