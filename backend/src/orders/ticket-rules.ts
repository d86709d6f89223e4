// Quy tắc hợp lệ của ticket (không đụng tới DB, dễ test)

import { BadRequestException, ConflictException } from '@nestjs/common';
import type { CinemaHall } from '../catalog/cinema-halls/schemas/cinema-hall.schema';

export interface Place {
  row: number;
  seat: number;
}

export type HallSize = Pick<CinemaHall, 'rows' | 'seatsInRow'>;

/**
 * Ghế phải nằm trong phòng: 1 <= row <= rows, 1 <= seat <= seatsInRow
 * @throws BadRequestException kèm khoảng hợp lệ
 */
export function assertPlaceInHall(place: Place, hall: HallSize): void {
  if (!Number.isInteger(place.row) || place.row < 1 || place.row > hall.rows) {
    throw new BadRequestException(
      `row number must be in available range: (1, rows): (1, ${hall.rows})`,
    );
  }

  if (
    !Number.isInteger(place.seat) ||
    place.seat < 1 ||
    place.seat > hall.seatsInRow
  ) {
    throw new BadRequestException(
      `seat number must be in available range: (1, seatsInRow): (1, ${hall.seatsInRow})`,
    );
  }
}

// Khoá duy nhất của 1 ghế trong 1 suất chiếu: "<sessionId>:<row>:<seat>"
export function placeKey(movieSession: string, place: Place): string {
  return `${movieSession}:${place.row}:${place.seat}`;
}

/**
 * Chặn ghế bị đặt 2 lần: trùng trong chính order hoặc đã có trong order khác
 * @param taken - tập placeKey() của các ghế đã có người đặt
 * @throws ConflictException
 */
export function assertPlacesFree(
  tickets: Array<Place & { movieSession: string }>,
  taken: ReadonlySet<string>,
): void {
  const seen = new Set<string>();

  for (const ticket of tickets) {
    const key = placeKey(ticket.movieSession, ticket);

    if (seen.has(key)) {
      throw new ConflictException(
        `Seat ${ticket.row}-${ticket.seat} is listed more than once in this order`,
      );
    }
    if (taken.has(key)) {
      throw new ConflictException(
        `Seat ${ticket.row}-${ticket.seat} is already taken for this session`,
      );
    }

    seen.add(key);
  }
}
