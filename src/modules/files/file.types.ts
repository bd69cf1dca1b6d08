export type FileRecord = {
  id: number;
  createdAt: Date;
  blogId: number;
  storageKey: string;
  originalFilename: string;
  contentType: string;
  size: number;
};

export type NewFileRecord = Omit<FileRecord, 'id' | 'createdAt'>;

/** The parts of a multipart upload the service reads (a subset of multer's file). */
export type UploadedFilePart = {
  originalname: string;
  mimetype: string;
  size: number;
  buffer: Buffer;
};
