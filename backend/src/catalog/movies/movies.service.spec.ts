import { NotFoundException } from '@nestjs/common';
import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';
import { Readable } from 'stream';
import { MOVIE_IMAGE_DIR, MoviesService } from './movies.service';
import { Movie } from './schemas/movie.schema';
import { Genre } from '../genres/schemas/genre.schema';
import { Actor } from '../actors/schemas/actor.schema';
import { MediaStorageService } from '../../media/media-storage.service';

function uploadedFile(buffer: Buffer): Express.Multer.File {
  return {
    fieldname: 'image',
    originalname: 'poster.bin',
    encoding: '7bit',
    mimetype: 'application/octet-stream',
    size: buffer.length,
    buffer,
    stream: Readable.from(buffer),
    destination: '',
    filename: '',
    path: '',
  };
}

describe('MoviesService.uploadImage', () => {
  const movieId = new Types.ObjectId();
  const jpeg = uploadedFile(Buffer.from([0xff, 0xd8, 0xff, 0xe0]));

  let movie: { _id: Types.ObjectId; title: string; image: string | null; save: jest.Mock };
  let service: MoviesService;

  const movieModel = { findById: jest.fn() };
  const mediaStorage = {
    save: jest.fn(),
    remove: jest.fn(),
    publicUrl: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();
    movie = { _id: movieId, title: 'Bố Già', image: null, save: jest.fn() };
    movieModel.findById.mockImplementation((id: string) => ({
      exec: async () => (id === movieId.toString() ? movie : null),
    }));
    mediaStorage.save.mockImplementation(
      async (dir: string, filename: string) => `${dir}/${filename}`,
    );
    mediaStorage.remove.mockResolvedValue(undefined);
    mediaStorage.publicUrl.mockImplementation((rel: string) => `/media/${rel}`);

    const moduleRef = await Test.createTestingModule({
      providers: [
        MoviesService,
        { provide: getModelToken(Movie.name), useValue: movieModel },
        { provide: getModelToken(Genre.name), useValue: {} },
        { provide: getModelToken(Actor.name), useValue: {} },
        { provide: MediaStorageService, useValue: mediaStorage },
      ],
    }).compile();

    service = moduleRef.get(MoviesService);
  });

  it('names the file after the movie title with a unique suffix', async () => {
    const result = await service.uploadImage(movieId.toString(), jpeg);

    expect(movie.image).toMatch(
      /^uploads\/movies\/bo-gia-[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}\.jpg$/,
    );
    expect(mediaStorage.save).toHaveBeenCalledWith(
      MOVIE_IMAGE_DIR,
      expect.stringMatching(/^bo-gia-.+\.jpg$/),
      jpeg.buffer,
    );
    expect(movie.save).toHaveBeenCalledTimes(1);
    expect(result).toEqual({ id: movieId.toString(), image: `/media/${movie.image}` });
  });

  it('removes the previous image after saving the new one', async () => {
    movie.image = 'uploads/movies/old.jpg';

    await service.uploadImage(movieId.toString(), jpeg);

    expect(mediaStorage.remove).toHaveBeenCalledWith('uploads/movies/old.jpg');
  });

  it('gives two uploads of the same movie different names', async () => {
    await service.uploadImage(movieId.toString(), jpeg);
    const first = movie.image;
    await service.uploadImage(movieId.toString(), jpeg);

    expect(movie.image).not.toBe(first);
  });

  it('answers 404 for an unknown movie', async () => {
    await expect(
      service.uploadImage(new Types.ObjectId().toString(), jpeg),
    ).rejects.toThrow(new NotFoundException('Movie not found'));
    expect(mediaStorage.save).not.toHaveBeenCalled();
  });

  it('answers 404 for a malformed id', async () => {
    await expect(service.uploadImage('not-an-id', jpeg)).rejects.toThrow(NotFoundException);
    expect(movieModel.findById).not.toHaveBeenCalled();
  });
});
