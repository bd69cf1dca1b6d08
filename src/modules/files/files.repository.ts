import type { FileRecord, NewFileRecord } from './file.types';

export abstract class FilesRepository {
  abstract findById(id: number): Promise<FileRecord | null>;
  abstract create(file: NewFileRecord): Promise<FileRecord>;
  abstract delete(id: number): Promise<void>;
}
