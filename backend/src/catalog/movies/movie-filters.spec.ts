import { BadRequestException } from '@nestjs/common';
import { Types } from 'mongoose';
import { buildMovieFilter } from './movie-filters';

describe('buildMovieFilter', () => {
  const genreA = '65f000000000000000000011';
  const genreB = '65f000000000000000000012';
  const actor = '65f000000000000000000021';

  it('returns an empty filter without query parameters', () => {
    expect(buildMovieFilter({})).toEqual({});
  });

  it('matches the title case-insensitively as a literal substring', () => {
    expect(buildMovieFilter({ title: '  Mr. Bean (2) ' })).toEqual({
      title: { $regex: 'Mr\\. Bean \\(2\\)', $options: 'i' },
    });
  });

  it('ignores a blank title', () => {
    expect(buildMovieFilter({ title: '   ' })).toEqual({});
  });

  it('turns comma separated ids into $in filters', () => {
    expect(buildMovieFilter({ genres: `${genreA}, ${genreB}`, actors: actor })).toEqual({
      genres: { $in: [new Types.ObjectId(genreA), new Types.ObjectId(genreB)] },
      actors: { $in: [new Types.ObjectId(actor)] },
    });
  });

  it('rejects a malformed id', () => {
    expect(() => buildMovieFilter({ genres: 'abc' })).toThrow(
      new BadRequestException('genres: "abc" is not a valid id'),
    );
  });
});
