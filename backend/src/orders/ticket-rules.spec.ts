import { BadRequestException, ConflictException } from '@nestjs/common';
import { assertPlaceInHall, assertPlacesFree, placeKey } from './ticket-rules';

describe('ticket rules', () => {
  const hall = { rows: 10, seatsInRow: 12 };

  describe('assertPlaceInHall', () => {
    it.each([
      { row: 1, seat: 1 },
      { row: 10, seat: 12 },
      { row: 5, seat: 7 },
    ])('accepts row $row seat $seat', (place) => {
      expect(() => assertPlaceInHall(place, hall)).not.toThrow();
    });

    it.each([0, 11, -1])('rejects row %i with the hall range', (row) => {
      expect(() => assertPlaceInHall({ row, seat: 1 }, hall)).toThrow(
        new BadRequestException(
          'row number must be in available range: (1, rows): (1, 10)',
        ),
      );
    });

    it.each([0, 13])('rejects seat %i with the hall range', (seat) => {
      expect(() => assertPlaceInHall({ row: 1, seat }, hall)).toThrow(
        new BadRequestException(
          'seat number must be in available range: (1, seatsInRow): (1, 12)',
        ),
      );
    });

    it('checks the row before the seat', () => {
      expect(() => assertPlaceInHall({ row: 99, seat: 99 }, hall)).toThrow(
        'row number must be in available range: (1, rows): (1, 10)',
      );
    });
  });

  describe('assertPlacesFree', () => {
    const session = '65f0000000000000000000aa';
    const otherSession = '65f0000000000000000000bb';

    it('accepts distinct free places', () => {
      const tickets = [
        { movieSession: session, row: 1, seat: 1 },
        { movieSession: session, row: 1, seat: 2 },
        { movieSession: otherSession, row: 1, seat: 1 },
      ];

      expect(() =>
        assertPlacesFree(tickets, new Set([placeKey(session, { row: 2, seat: 2 })])),
      ).not.toThrow();
    });

    it('rejects the same place twice in one order', () => {
      const tickets = [
        { movieSession: session, row: 3, seat: 4 },
        { movieSession: session, row: 3, seat: 4 },
      ];

      expect(() => assertPlacesFree(tickets, new Set())).toThrow(
        new ConflictException('Seat 3-4 is listed more than once in this order'),
      );
    });

    it('rejects a place already sold for the session', () => {
      const taken = new Set([placeKey(session, { row: 5, seat: 6 })]);

      expect(() =>
        assertPlacesFree([{ movieSession: session, row: 5, seat: 6 }], taken),
      ).toThrow(new ConflictException('Seat 5-6 is already taken for this session'));
    });

    it('does not confuse the same place in another session', () => {
      const taken = new Set([placeKey(otherSession, { row: 5, seat: 6 })]);

      expect(() =>
        assertPlacesFree([{ movieSession: session, row: 5, seat: 6 }], taken),
      ).not.toThrow();
    });
  });
});
