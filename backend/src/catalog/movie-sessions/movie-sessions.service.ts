// MovieSessionsService - CRUD suất chiếu + số ghế còn trống
import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model, Types } from 'mongoose';
import {
  MovieSession,
  MovieSessionDocument,
} from './schemas/movie-session.schema';
import { Movie, MovieDocument } from '../movies/schemas/movie.schema';
import {
  CinemaHall,
  CinemaHallDocument,
  hallCapacity,
} from '../cinema-halls/schemas/cinema-hall.schema';
import { CreateMovieSessionDto } from './dto/create-movie-session.dto';
import { UpdateMovieSessionDto } from './dto/update-movie-session.dto';
import { MovieSessionFilterDto } from './dto/movie-session-filter.dto';
import { buildMovieSessionFilter } from './movie-session-filters';
import { SeatOccupancyService } from '../../orders/seat-occupancy.service';
import { MediaStorageService } from '../../media/media-storage.service';

type MovieRecord = Movie & { _id: Types.ObjectId };
type CinemaHallRecord = CinemaHall & { _id: Types.ObjectId };

// MovieSession sau khi populate movie + cinemaHall
type PopulatedSession = Omit<MovieSession, 'movie' | 'cinemaHall'> & {
  _id: Types.ObjectId;
  movie: MovieRecord;
  cinemaHall: CinemaHallRecord;
};

export interface MovieSessionListItem {
  id: string;
  showTime: Date;
  movieTitle: string;
  movieImage: string | null;
  cinemaHallName: string;
  cinemaHallCapacity: number;
  ticketsAvailable: number;
}

export interface MovieSessionDetail {
  id: string;
  showTime: Date;
  movie: {
    id: string;
    title: string;
    description: string;
    duration: number;
    image: string | null;
  };
  cinemaHall: {
    id: string;
    name: string;
    rows: number;
    seatsInRow: number;
    capacity: number;
  };
  takenPlaces: Array<{ row: number; seat: number }>;
}

@Injectable()
export class MovieSessionsService {
  private readonly logger = new Logger(MovieSessionsService.name);

  constructor(
    @InjectModel(MovieSession.name)
    private readonly sessionModel: Model<MovieSessionDocument>,
    @InjectModel(Movie.name) private readonly movieModel: Model<MovieDocument>,
    @InjectModel(CinemaHall.name)
    private readonly cinemaHallModel: Model<CinemaHallDocument>,
    private readonly seatOccupancy: SeatOccupancyService,
    private readonly mediaStorage: MediaStorageService,
  ) {}

  // Danh sách suất chiếu, lọc theo ngày / phim, sắp theo giờ chiếu
  async findAll(query: MovieSessionFilterDto): Promise<MovieSessionListItem[]> {
    const sessions = await this.sessionModel
      .find(buildMovieSessionFilter(query))
      .sort({ showTime: 1 })
      .populate('movie', 'title image')
      .populate('cinemaHall', 'name rows seatsInRow')
      .lean<PopulatedSession[]>()
      .exec();

    // 1 query aggregate cho tất cả suất chiếu thay vì đếm từng suất
    const sold = await this.seatOccupancy.countTickets(
      sessions.map((session) => session._id),
    );

    return sessions.map((session) => {
      const capacity = hallCapacity(session.cinemaHall);
      return {
        id: session._id.toString(),
        showTime: session.showTime,
        movieTitle: session.movie.title,
        movieImage: this.mediaStorage.publicUrl(session.movie.image),
        cinemaHallName: session.cinemaHall.name,
        cinemaHallCapacity: capacity,
        // Phòng bị đổi sang phòng nhỏ hơn sau khi đã bán vé thì không để âm
        ticketsAvailable: Math.max(
          0,
          capacity - (sold.get(session._id.toString()) ?? 0),
        ),
      };
    });
  }

  // Chi tiết suất chiếu kèm danh sách ghế đã có người đặt
  async findOne(id: string): Promise<MovieSessionDetail> {
    const session = isValidObjectId(id)
      ? await this.sessionModel
          .findById(id)
          .populate('movie', 'title description duration image')
          .populate('cinemaHall', 'name rows seatsInRow')
          .lean<PopulatedSession | null>()
          .exec()
      : null;
    if (!session) throw new NotFoundException('Movie session not found');

    const taken = await this.seatOccupancy.findTakenPlaces([session._id]);

    return {
      id: session._id.toString(),
      showTime: session.showTime,
      movie: {
        id: session.movie._id.toString(),
        title: session.movie.title,
        description: session.movie.description,
        duration: session.movie.duration,
        image: this.mediaStorage.publicUrl(session.movie.image),
      },
      cinemaHall: {
        id: session.cinemaHall._id.toString(),
        name: session.cinemaHall.name,
        rows: session.cinemaHall.rows,
        seatsInRow: session.cinemaHall.seatsInRow,
        capacity: hallCapacity(session.cinemaHall),
      },
      takenPlaces: taken.map(({ row, seat }) => ({ row, seat })),
    };
  }

  // Tạo suất chiếu (staff)
  async create(dto: CreateMovieSessionDto): Promise<MovieSessionDetail> {
    await this.assertReferences(dto);

    const session = await new this.sessionModel({
      showTime: new Date(dto.showTime),
      movie: dto.movie,
      cinemaHall: dto.cinemaHall,
    }).save();

    this.logger.log(`Created movie session ${session._id.toString()}`);
    return this.findOne(session._id.toString());
  }

  // PUT: thay toàn bộ, PATCH: chỉ các field gửi lên
  async update(
    id: string,
    dto: CreateMovieSessionDto | UpdateMovieSessionDto,
  ): Promise<MovieSessionDetail> {
    await this.assertReferences(dto);

    const changes: Partial<MovieSession> = {};
    if (dto.showTime) changes.showTime = new Date(dto.showTime);
    if (dto.movie) changes.movie = new Types.ObjectId(dto.movie);
    if (dto.cinemaHall) changes.cinemaHall = new Types.ObjectId(dto.cinemaHall);

    const updated = isValidObjectId(id)
      ? await this.sessionModel
          .findByIdAndUpdate(id, changes, { new: true })
          .exec()
      : null;
    if (!updated) throw new NotFoundException('Movie session not found');

    return this.findOne(updated._id.toString());
  }

  // Xoá suất chiếu
  async remove(id: string): Promise<void> {
    const res = isValidObjectId(id)
      ? await this.sessionModel.findByIdAndDelete(id).exec()
      : null;
    if (!res) throw new NotFoundException('Movie session not found');

    this.logger.log(`Deleted movie session ${id}`);
  }

  // movie/cinemaHall gửi lên phải tồn tại → nếu không 400
  private async assertReferences(
    dto: Pick<UpdateMovieSessionDto, 'movie' | 'cinemaHall'>,
  ): Promise<void> {
    if (dto.movie && !(await this.movieModel.exists({ _id: dto.movie }).exec())) {
      throw new BadRequestException(`movie: "${dto.movie}" does not exist`);
    }

    if (
      dto.cinemaHall &&
      !(await this.cinemaHallModel.exists({ _id: dto.cinemaHall }).exec())
    ) {
      throw new BadRequestException(
        `cinemaHall: "${dto.cinemaHall}" does not exist`,
      );
    }
  }
}
