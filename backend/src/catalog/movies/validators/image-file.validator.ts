// Kiểm tra file upload có đúng là ảnh hay không dựa trên magic bytes,
// không tin mimetype/đuôi file do client gửi lên

import { FileValidator } from '@nestjs/common';

export type ImageExtension = 'jpg' | 'png' | 'gif' | 'webp';

const SIGNATURES: Array<{ extension: ImageExtension; matches: (b: Buffer) => boolean }> = [
  {
    extension: 'jpg',
    matches: (b) => b.length >= 3 && b[0] === 0xff && b[1] === 0xd8 && b[2] === 0xff,
  },
  {
    extension: 'png',
    matches: (b) =>
      b.length >= 8 &&
      b.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])),
  },
  {
    extension: 'gif',
    matches: (b) =>
      b.length >= 6 &&
      ['GIF87a', 'GIF89a'].includes(b.subarray(0, 6).toString('ascii')),
  },
  {
    extension: 'webp',
    matches: (b) =>
      b.length >= 12 &&
      b.subarray(0, 4).toString('ascii') === 'RIFF' &&
      b.subarray(8, 12).toString('ascii') === 'WEBP',
  },
];

// null = không phải định dạng ảnh được hỗ trợ
export function detectImageExtension(buffer: Buffer): ImageExtension | null {
  const signature = SIGNATURES.find((candidate) => candidate.matches(buffer));
  return signature ? signature.extension : null;
}

function hasBuffer(file: unknown): file is { buffer: Buffer } {
  return (
    typeof file === 'object' &&
    file !== null &&
    'buffer' in file &&
    Buffer.isBuffer(file.buffer)
  );
}

// Dùng trong ParseFilePipe của endpoint upload-image
export class ImageFileValidator extends FileValidator<Record<string, never>> {
  constructor() {
    super({});
  }

  isValid(file?: unknown): boolean {
    return hasBuffer(file) && detectImageExtension(file.buffer) !== null;
  }

  buildErrorMessage(): string {
    return 'Upload a valid image. The file you uploaded was either not an image or a corrupted image.';
  }
}
