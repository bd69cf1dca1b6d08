import { BadRequestException, NotFoundException, ServiceUnavailableException } from '@nestjs/common';
import {
  InMemoryFileStorage,
  InMemoryFilesRepository,
  testAppConfig,
  upload,
} from '../../../test/support/in-memory';
import type { Blog } from '../blogs/blog.types';
import { toFileResponseDto } from './file.dto';
import { FilesService, extForContentType } from './files.service';
import { S3FileStorage } from './s3-file-storage';

const blog: Blog = {
  id: 3,
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
  blogName: 'alice',
  preferredBlogName: 'alice',
  isPrivate: false,
  userId: 1,
};

function makeService(env: Record<string, string> = {}) {
  const repo = new InMemoryFilesRepository();
  const storage = new InMemoryFileStorage();
  const svc = new FilesService(repo, storage, testAppConfig({ UPLOAD_MAX_BYTES: '16', ...env }));
  return { svc, repo, storage };
}

describe('FilesService', () => {
  it('stores the bytes under the blog prefix and records the metadata', async () => {
    const { svc, storage } = makeService();

    const file = await svc.createFile(upload('dir/photo.PNG', 'IMAGE/PNG', 'abc'), blog);

    expect(file).toMatchObject({ id: 1, blogId: 3, originalFilename: 'photo.PNG', contentType: 'image/png', size: 3 });
    expect(file.storageKey).toMatch(/^blogs\/3\/[0-9a-f-]{36}\.png$/);
    expect(storage.objects.get(file.storageKey)?.contentType).toBe('image/png');
    expect(storage.objects.get(file.storageKey)?.bytes.toString()).toBe('abc');
  });

  it('rejects unsupported types, empty files and oversized files', async () => {
    const { svc, storage, repo } = makeService();

    await expect(svc.createFile(upload('a.txt', 'text/plain'), blog)).rejects.toThrow(
      new BadRequestException('Unsupported file type: text/plain.'),
    );
    await expect(svc.createFile(upload('a.png', 'image/png', ''), blog)).rejects.toThrow('Uploaded file is empty.');
    await expect(svc.createFile(upload('a.png', 'image/png', 'x'.repeat(17)), blog)).rejects.toThrow(
      'Uploaded file is too large.',
    );
    expect(storage.objects.size).toBe(0);
    expect(repo.files.size).toBe(0);
  });

  it('accepts a file of exactly the size limit', async () => {
    const { svc } = makeService();

    await expect(svc.createFile(upload('a.gif', 'image/gif', 'x'.repeat(16)), blog)).resolves.toMatchObject({ size: 16 });
  });

  it('deleteFile removes only the row and returns it', async () => {
    const { svc, storage, repo } = makeService();
    const file = await svc.createFile(upload('a.webp', 'image/webp'), blog);

    await expect(svc.deleteFile(file.id)).resolves.toEqual(file);

    expect(repo.files.size).toBe(0);
    expect(storage.objects.has(file.storageKey)).toBe(true);
  });

  it('getFile and deleteFile throw NotFound for unknown ids', async () => {
    const { svc } = makeService();

    await expect(svc.getFile(5)).rejects.toThrow(new NotFoundException('File with id 5 is not found.'));
    await expect(svc.deleteFile(5)).rejects.toThrow(NotFoundException);
  });

  it('deleteObjects keeps going when one delete fails', async () => {
    const { svc, storage } = makeService();
    const a = await svc.createFile(upload('a.png'), blog);
    const b = await svc.createFile(upload('b.png'), blog);
    jest.spyOn(storage, 'delete').mockRejectedValueOnce(new Error('timeout'));

    await svc.deleteObjects([a.storageKey, b.storageKey]);

    expect([...storage.objects.keys()]).toEqual([a.storageKey]);
  });

  it('validate accepts allowlisted uploads without storing them', () => {
    const { svc, storage } = makeService();

    expect(svc.validate(upload('a.mov', 'video/quicktime'))).toEqual({ contentType: 'video/quicktime', ext: 'mov' });
    expect(() => svc.validate(upload('a.txt', 'text/plain'))).toThrow(BadRequestException);
    expect(storage.objects.size).toBe(0);
  });
});

describe('toFileResponseDto', () => {
  const file = {
    id: 4,
    createdAt: new Date('2024-01-02T00:00:00.000Z'),
    blogId: 3,
    storageKey: 'blogs/3/clip.mp4',
    originalFilename: 'clip.mp4',
    contentType: 'video/mp4',
    size: 5,
  };

  it('builds a public URL when a base is configured', () => {
    expect(toFileResponseDto(file, 'https://assets.example.test/')).toEqual({
      id: 4,
      createdAt: '2024-01-02T00:00:00.000Z',
      filename: 'clip.mp4',
      contentType: 'video/mp4',
      size: 5,
      url: 'https://assets.example.test/blogs/3/clip.mp4',
    });
  });

  it('maps to a null URL without a public base', () => {
    expect(toFileResponseDto(file).url).toBeNull();
  });
});

describe('extForContentType', () => {
  it('knows the allowlist', () => {
    expect(extForContentType('video/quicktime')).toBe('mov');
    expect(extForContentType('video/webm')).toBe('webm');
    expect(extForContentType('application/pdf')).toBeNull();
  });
});

describe('S3FileStorage', () => {
  it('fails with 503 when storage is not configured', async () => {
    const storage = new S3FileStorage(testAppConfig());

    await expect(storage.put('k', Buffer.from('x'), 'image/png')).rejects.toThrow(ServiceUnavailableException);
  });
});
