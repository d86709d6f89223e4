// Chuyển query string thành filter MongoDB cho collection movieSessions
import { BadRequestException } from '@nestjs/common';
import type { FilterQuery } from 'mongoose';
import { toObjectId } from '../../common/utils/object-id';
import type { MovieSession } from './schemas/movie-session.schema';
import type { MovieSessionFilterDto } from './dto/movie-session-filter.dto';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * "2026-06-02" → [2026-06-02T00:00:00Z, 2026-06-03T00:00:00Z)
 * Ngày không tồn tại (VD: 2026-02-30) → 400
 */
export function utcDayRange(date: string): { start: Date; end: Date } {
  const start = new Date(`${date}T00:00:00.000Z`);

  if (Number.isNaN(start.getTime()) || start.toISOString().slice(0, 10) !== date) {
    throw new BadRequestException(`date: "${date}" is not a valid date`);
  }

  return { start, end: new Date(start.getTime() + DAY_MS) };
}

export function buildMovieSessionFilter(
  query: MovieSessionFilterDto,
): FilterQuery<MovieSession> {
  const filter: FilterQuery<MovieSession> = {};

  if (query.date) {
    const { start, end } = utcDayRange(query.date);
    filter.showTime = { $gte: start, $lt: end };
  }

  if (query.movie) {
    filter.movie = toObjectId(query.movie, 'movie');
  }

  return filter;
}
