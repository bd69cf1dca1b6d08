/** Byte store for attachments, addressed by object key. */
export abstract class FileStorage {
  abstract put(key: string, bytes: Buffer, contentType: string): Promise<void>;
  /** Deleting a missing object is not an error. */
  abstract delete(key: string): Promise<void>;
}
