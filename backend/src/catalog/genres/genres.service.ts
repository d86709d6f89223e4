// GenresService - danh sách và tạo mới thể loại
import { ConflictException, Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Genre, GenreDocument } from './schemas/genre.schema';
import { CreateGenreDto } from './dto/create-genre.dto';
import { isDuplicateKeyError } from '../../common/utils/mongo-errors';

export interface GenreResponse {
  id: string;
  name: string;
}

@Injectable()
export class GenresService {
  constructor(
    @InjectModel(Genre.name) private readonly genreModel: Model<GenreDocument>,
  ) {}

  async create(dto: CreateGenreDto): Promise<GenreResponse> {
    const exists = await this.genreModel.exists({ name: dto.name }).exec();
    if (exists) {
      throw new ConflictException(`Genre "${dto.name}" already exists`);
    }

    // exists() ở trên không chặn được 2 request tạo cùng lúc → unique index báo E11000
    const genre = await new this.genreModel(dto)
      .save()
      .catch((error: unknown) => {
        if (isDuplicateKeyError(error)) {
          throw new ConflictException(`Genre "${dto.name}" already exists`);
        }
        throw error;
      });
    return { id: genre._id.toString(), name: genre.name };
  }

  async findAll(): Promise<GenreResponse[]> {
    const genres = await this.genreModel.find().sort({ name: 1 }).exec();
    return genres.map((genre) => ({
      id: genre._id.toString(),
      name: genre.name,
    }));
  }
}
