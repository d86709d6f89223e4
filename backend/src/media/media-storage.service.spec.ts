import { ConfigService } from '@nestjs/config';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { MediaStorageService } from './media-storage.service';

describe('MediaStorageService', () => {
  let root: string;
  let storage: MediaStorageService;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'cinema-media-'));
    storage = new MediaStorageService(
      new ConfigService({ media: { root, url: '/media/' } }),
    );
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('writes the file under the media root and returns a relative path', async () => {
    const relative = await storage.save('uploads/movies', 'poster.jpg', Buffer.from('abc'));

    expect(relative).toBe('uploads/movies/poster.jpg');
    await expect(
      readFile(path.join(root, 'uploads', 'movies', 'poster.jpg'), 'utf8'),
    ).resolves.toBe('abc');
  });

  it('removes a stored file', async () => {
    const relative = await storage.save('uploads/movies', 'old.jpg', Buffer.from('x'));

    await storage.remove(relative);

    await expect(readFile(path.join(root, 'uploads', 'movies', 'old.jpg'))).rejects.toThrow(
      /ENOENT/,
    );
  });

  it('ignores a file that is already gone', async () => {
    await expect(storage.remove('uploads/movies/missing.jpg')).resolves.toBeUndefined();
  });

  it('still reports failures other than a missing file', async () => {
    await storage.save('uploads/movies', 'poster.jpg', Buffer.from('abc'));

    // unlink trên thư mục → lỗi khác ENOENT
    await expect(storage.remove('uploads/movies')).rejects.toHaveProperty(
      'code',
      expect.not.stringMatching(/^ENOENT$/),
    );
  });

  it('builds the public URL from MEDIA_URL', () => {
    expect(storage.publicUrl('uploads/movies/poster.jpg')).toBe(
      '/media/uploads/movies/poster.jpg',
    );
    expect(storage.publicUrl(null)).toBeNull();
  });
});
