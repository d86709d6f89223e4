// MoviesService - danh sách (có lọc), chi tiết, tạo phim và upload poster
import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model, Types } from 'mongoose';
import { v4 as uuidv4 } from 'uuid';
import { Movie, MovieDocument } from './schemas/movie.schema';
import { Genre, GenreDocument } from '../genres/schemas/genre.schema';
import {
  Actor,
  ActorDocument,
  actorFullName,
} from '../actors/schemas/actor.schema';
import { CreateMovieDto } from './dto/create-movie.dto';
import { MovieFilterDto } from './dto/movie-filter.dto';
import { buildMovieFilter } from './movie-filters';
import { detectImageExtension } from './validators/image-file.validator';
import { MediaStorageService } from '../../media/media-storage.service';
import { slugify } from '../../common/utils/slugify';
import type { GenreResponse } from '../genres/genres.service';
import type { ActorResponse } from '../actors/actors.service';

// Thư mục con trong MEDIA_ROOT chứa poster phim
export const MOVIE_IMAGE_DIR = 'uploads/movies';

type GenreRecord = Genre & { _id: Types.ObjectId };
type ActorRecord = Actor & { _id: Types.ObjectId };

// Movie sau khi populate genres + actors
type PopulatedMovie = Omit<Movie, 'genres' | 'actors'> & {
  _id: Types.ObjectId;
  genres: GenreRecord[];
  actors: ActorRecord[];
};

// Item trong danh sách: genres/actors chỉ hiển thị tên cho gọn
export interface MovieListItem {
  id: string;
  title: string;
  description: string;
  duration: number;
  genres: string[];
  actors: string[];
  image: string | null;
}

export interface MovieDetail {
  id: string;
  title: string;
  description: string;
  duration: number;
  genres: GenreResponse[];
  actors: ActorResponse[];
  image: string | null;
}

export interface MovieImageResponse {
  id: string;
  image: string | null;
}

@Injectable()
export class MoviesService {
  private readonly logger = new Logger(MoviesService.name);

  constructor(
    @InjectModel(Movie.name) private readonly movieModel: Model<MovieDocument>,
    @InjectModel(Genre.name) private readonly genreModel: Model<GenreDocument>,
    @InjectModel(Actor.name) private readonly actorModel: Model<ActorDocument>,
    private readonly mediaStorage: MediaStorageService,
  ) {}

  // Danh sách phim (public), lọc theo title / genres / actors
  async findAll(query: MovieFilterDto): Promise<MovieListItem[]> {
    const movies = await this.movieModel
      .find(buildMovieFilter(query))
      .sort({ title: 1 })
      .populate('genres', 'name')
      .populate('actors', 'firstName lastName')
      .lean<PopulatedMovie[]>()
      .exec();

    return movies.map((movie) => ({
      id: movie._id.toString(),
      title: movie.title,
      description: movie.description,
      duration: movie.duration,
      genres: movie.genres.map((genre) => genre.name),
      actors: movie.actors.map((actor) => actorFullName(actor)),
      image: this.mediaStorage.publicUrl(movie.image),
    }));
  }

  // Chi tiết phim, genres/actors đầy đủ thông tin
  async findOne(id: string): Promise<MovieDetail> {
    const movie = await this.findPopulated(id);
    if (!movie) throw new NotFoundException('Movie not found');

    return {
      id: movie._id.toString(),
      title: movie.title,
      description: movie.description,
      duration: movie.duration,
      genres: movie.genres.map((genre) => ({
        id: genre._id.toString(),
        name: genre.name,
      })),
      actors: movie.actors.map((actor) => ({
        id: actor._id.toString(),
        firstName: actor.firstName,
        lastName: actor.lastName,
        fullName: actorFullName(actor),
      })),
      image: this.mediaStorage.publicUrl(movie.image),
    };
  }

  // Tạo phim mới (staff)
  async create(dto: CreateMovieDto): Promise<MovieDetail> {
    const [genresFound, actorsFound] = await Promise.all([
      this.genreModel.countDocuments({ _id: { $in: dto.genres } }).exec(),
      this.actorModel.countDocuments({ _id: { $in: dto.actors } }).exec(),
    ]);
    assertAllFound(genresFound, dto.genres, 'genres');
    assertAllFound(actorsFound, dto.actors, 'actors');

    const movie = await new this.movieModel({
      title: dto.title,
      description: dto.description,
      duration: dto.duration,
      genres: dto.genres,
      actors: dto.actors,
    }).save();

    this.logger.log(`Created movie ${movie._id.toString()} "${movie.title}"`);
    return this.findOne(movie._id.toString());
  }

  /**
   * Lưu poster cho phim: tên file = <slug(title)>-<uuid>.<ext>
   * Poster cũ (nếu có) bị xoá khỏi đĩa sau khi DB đã trỏ sang file mới
   */
  async uploadImage(
    id: string,
    file: Express.Multer.File,
  ): Promise<MovieImageResponse> {
    const movie = isValidObjectId(id)
      ? await this.movieModel.findById(id).exec()
      : null;
    if (!movie) throw new NotFoundException('Movie not found');

    // ImageFileValidator đã chặn file không phải ảnh ở controller
    const extension = detectImageExtension(file.buffer);
    if (!extension) {
      throw new BadRequestException('Upload a valid image.');
    }

    const filename = `${slugify(movie.title) || 'movie'}-${uuidv4()}.${extension}`;
    const previousImage = movie.image;

    movie.image = await this.mediaStorage.save(
      MOVIE_IMAGE_DIR,
      filename,
      file.buffer,
    );
    await movie.save();

    if (previousImage) {
      await this.mediaStorage.remove(previousImage);
    }

    this.logger.log(`Uploaded image for movie ${movie._id.toString()}`);
    return {
      id: movie._id.toString(),
      image: this.mediaStorage.publicUrl(movie.image),
    };
  }

  private async findPopulated(id: string): Promise<PopulatedMovie | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    return this.movieModel
      .findById(id)
      .populate('genres', 'name')
      .populate('actors', 'firstName lastName')
      .lean<PopulatedMovie | null>()
      .exec();
  }
}

// Mọi ID tham chiếu phải tồn tại, nếu không → 400
function assertAllFound(found: number, ids: string[], field: string) {
  if (found !== ids.length) {
    throw new BadRequestException(
      `${field}: some of the given ids do not exist`,
    );
  }
}
