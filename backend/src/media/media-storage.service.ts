// MediaStorageService - lưu/xoá file upload trên đĩa (thư mục MEDIA_ROOT)
// DB chỉ lưu đường dẫn tương đối (VD: "uploads/movies/abc.jpg"),
// URL public = MEDIA_URL + đường dẫn tương đối

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, unlink, writeFile } from 'fs/promises';
import * as path from 'path';

@Injectable()
export class MediaStorageService {
  private readonly logger = new Logger(MediaStorageService.name);

  constructor(private readonly configService: ConfigService) {}

  // Thư mục gốc tuyệt đối chứa media
  get root(): string {
    return path.resolve(this.configService.get<string>('media.root') ?? './media');
  }

  get baseUrl(): string {
    return this.configService.get<string>('media.url') ?? '/media/';
  }

  /**
   * Ghi file vào MEDIA_ROOT/<directory>/<filename>
   * @returns Đường dẫn tương đối (dùng dấu "/") để lưu vào DB
   */
  async save(directory: string, filename: string, data: Buffer): Promise<string> {
    const relativePath = path.posix.join(directory, filename);
    const absolutePath = this.absolutePath(relativePath);

    await mkdir(path.dirname(absolutePath), { recursive: true });
    await writeFile(absolutePath, data);

    this.logger.log(`Stored ${relativePath} (${data.length} bytes)`);
    return relativePath;
  }

  // Xoá file cũ; file đã không còn trên đĩa thì bỏ qua
  async remove(relativePath: string): Promise<void> {
    try {
      await unlink(this.absolutePath(relativePath));
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logger.warn(`Media file already missing: ${relativePath}`);
        return;
      }
      throw error;
    }
  }

  // null khi chưa có file (VD: phim chưa upload poster)
  publicUrl(relativePath: string | null | undefined): string | null {
    if (!relativePath) {
      return null;
    }
    return `${this.baseUrl}${relativePath}`;
  }

  private absolutePath(relativePath: string): string {
    return path.join(this.root, ...relativePath.split('/'));
  }
}

// Kiểm tra theo shape (không dùng instanceof Error: lỗi fs có thể đến từ realm khác)
function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
