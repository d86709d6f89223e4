import { NotFoundException } from '@nestjs/common';
import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { Types } from 'mongoose';
import { MovieSessionsService } from './movie-sessions.service';
import { MovieSession } from './schemas/movie-session.schema';
import { Movie } from '../movies/schemas/movie.schema';
import { CinemaHall } from '../cinema-halls/schemas/cinema-hall.schema';
import { SeatOccupancyService } from '../../orders/seat-occupancy.service';
import { MediaStorageService } from '../../media/media-storage.service';

// Query fake: mọi method của chain Mongoose trả về chính nó, exec() trả kết quả
function queryOf<T>(result: T) {
  const query = {
    sort: () => query,
    populate: () => query,
    lean: () => query,
    exec: async () => result,
  };
  return query;
}

describe('MovieSessionsService', () => {
  const sessionId = new Types.ObjectId();
  const movieId = new Types.ObjectId();
  const hallId = new Types.ObjectId();
  const showTime = new Date('2026-06-02T18:00:00.000Z');

  const populatedSession = (image: string | null) => ({
    _id: sessionId,
    showTime,
    movie: {
      _id: movieId,
      title: 'Test Movie',
      description: 'A movie used by tests',
      duration: 95,
      image,
    },
    cinemaHall: { _id: hallId, name: 'Hall A', rows: 4, seatsInRow: 5 },
  });

  const sessionModel = { find: jest.fn(), findById: jest.fn() };
  const seatOccupancy = { countTickets: jest.fn(), findTakenPlaces: jest.fn() };
  const mediaStorage = {
    publicUrl: (rel: string | null) => (rel ? `/media/${rel}` : null),
  };

  let service: MovieSessionsService;

  beforeEach(async () => {
    jest.resetAllMocks();

    const moduleRef = await Test.createTestingModule({
      providers: [
        MovieSessionsService,
        { provide: getModelToken(MovieSession.name), useValue: sessionModel },
        { provide: getModelToken(Movie.name), useValue: {} },
        { provide: getModelToken(CinemaHall.name), useValue: {} },
        { provide: SeatOccupancyService, useValue: seatOccupancy },
        { provide: MediaStorageService, useValue: mediaStorage },
      ],
    }).compile();

    service = moduleRef.get(MovieSessionsService);
  });

  describe('findAll', () => {
    it('lists sessions with the movie image and the seats still free', async () => {
      sessionModel.find.mockReturnValue(
        queryOf([populatedSession('uploads/movies/test-movie.jpg')]),
      );
      seatOccupancy.countTickets.mockResolvedValue(new Map([[sessionId.toString(), 3]]));

      await expect(service.findAll({})).resolves.toEqual([
        {
          id: sessionId.toString(),
          showTime,
          movieTitle: 'Test Movie',
          movieImage: '/media/uploads/movies/test-movie.jpg',
          cinemaHallName: 'Hall A',
          cinemaHallCapacity: 20,
          ticketsAvailable: 17,
        },
      ]);
      expect(seatOccupancy.countTickets).toHaveBeenCalledWith([sessionId]);
    });

    it('shows a null image for a movie without a poster', async () => {
      sessionModel.find.mockReturnValue(queryOf([populatedSession(null)]));
      seatOccupancy.countTickets.mockResolvedValue(new Map());

      const [item] = await service.findAll({});

      expect(item.movieImage).toBeNull();
      expect(item.ticketsAvailable).toBe(20);
    });

    it('never reports a negative number of free seats', async () => {
      sessionModel.find.mockReturnValue(queryOf([populatedSession(null)]));
      seatOccupancy.countTickets.mockResolvedValue(new Map([[sessionId.toString(), 25]]));

      const [item] = await service.findAll({});

      expect(item.ticketsAvailable).toBe(0);
    });

    it('filters by the UTC day and the movie', async () => {
      sessionModel.find.mockReturnValue(queryOf([]));
      seatOccupancy.countTickets.mockResolvedValue(new Map());

      await service.findAll({ date: '2026-06-02', movie: movieId.toString() });

      expect(sessionModel.find).toHaveBeenCalledWith({
        showTime: {
          $gte: new Date('2026-06-02T00:00:00.000Z'),
          $lt: new Date('2026-06-03T00:00:00.000Z'),
        },
        movie: movieId,
      });
    });
  });

  describe('findOne', () => {
    it('returns the session with its taken places', async () => {
      sessionModel.findById.mockReturnValue(queryOf(populatedSession(null)));
      seatOccupancy.findTakenPlaces.mockResolvedValue([
        { movieSession: sessionId.toString(), row: 1, seat: 2 },
        { movieSession: sessionId.toString(), row: 3, seat: 4 },
      ]);

      await expect(service.findOne(sessionId.toString())).resolves.toEqual({
        id: sessionId.toString(),
        showTime,
        movie: {
          id: movieId.toString(),
          title: 'Test Movie',
          description: 'A movie used by tests',
          duration: 95,
          image: null,
        },
        cinemaHall: {
          id: hallId.toString(),
          name: 'Hall A',
          rows: 4,
          seatsInRow: 5,
          capacity: 20,
        },
        takenPlaces: [
          { row: 1, seat: 2 },
          { row: 3, seat: 4 },
        ],
      });
    });

    it('answers 404 for an unknown session', async () => {
      sessionModel.findById.mockReturnValue(queryOf(null));

      await expect(service.findOne(new Types.ObjectId().toString())).rejects.toThrow(
        new NotFoundException('Movie session not found'),
      );
    });

    it('answers 404 for a malformed id without querying', async () => {
      await expect(service.findOne('abc')).rejects.toThrow(NotFoundException);
      expect(sessionModel.findById).not.toHaveBeenCalled();
    });
  });
});
