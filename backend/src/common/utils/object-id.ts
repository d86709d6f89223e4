// Helper chuyển chuỗi ID từ client sang ObjectId
// ID sai định dạng → 400 (thay vì để Mongoose ném CastError thành 500)

import { BadRequestException } from '@nestjs/common';
import { isValidObjectId, Types } from 'mongoose';

export function toObjectId(value: string, field: string): Types.ObjectId {
  if (!isValidObjectId(value)) {
    throw new BadRequestException(`${field}: "${value}" is not a valid id`);
  }
  return new Types.ObjectId(value);
}

/**
 * "id1,id2,id3" → [ObjectId, ObjectId, ObjectId]
 * Chuỗi rỗng hoặc undefined → undefined (không lọc)
 */
export function parseIdList(
  raw: string | undefined,
  field: string,
): Types.ObjectId[] | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const parts = raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

  if (parts.length === 0) {
    return undefined;
  }

  return parts.map((part) => toObjectId(part, field));
}

// Loại ID trùng lặp, giữ thứ tự xuất hiện đầu tiên
export function uniqueIds(ids: string[]): string[] {
  return [...new Set(ids)];
}
