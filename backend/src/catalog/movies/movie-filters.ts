// Chuyển query string của client thành filter MongoDB cho collection movies
import type { FilterQuery } from 'mongoose';
import { escapeRegex } from '../../common/utils/escape-regex';
import { parseIdList } from '../../common/utils/object-id';
import type { Movie } from './schemas/movie.schema';
import type { MovieFilterDto } from './dto/movie-filter.dto';

export function buildMovieFilter(query: MovieFilterDto): FilterQuery<Movie> {
  const filter: FilterQuery<Movie> = {};

  const title = query.title?.trim();
  if (title) {
    filter.title = { $regex: escapeRegex(title), $options: 'i' };
  }

  // Phim có ít nhất 1 thể loại / diễn viên nằm trong danh sách
  const genres = parseIdList(query.genres, 'genres');
  if (genres) {
    filter.genres = { $in: genres };
  }

  const actors = parseIdList(query.actors, 'actors');
  if (actors) {
    filter.actors = { $in: actors };
  }

  return filter;
}
