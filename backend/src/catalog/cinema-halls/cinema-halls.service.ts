// CinemaHallsService - danh sách và tạo mới phòng chiếu
import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import {
  CinemaHall,
  CinemaHallDocument,
  hallCapacity,
} from './schemas/cinema-hall.schema';
import { CreateCinemaHallDto } from './dto/create-cinema-hall.dto';

export interface CinemaHallResponse {
  id: string;
  name: string;
  rows: number;
  seatsInRow: number;
  capacity: number;
}

@Injectable()
export class CinemaHallsService {
  constructor(
    @InjectModel(CinemaHall.name)
    private readonly cinemaHallModel: Model<CinemaHallDocument>,
  ) {}

  async create(dto: CreateCinemaHallDto): Promise<CinemaHallResponse> {
    const hall = await new this.cinemaHallModel(dto).save();
    return this.toResponse(hall);
  }

  async findAll(): Promise<CinemaHallResponse[]> {
    const halls = await this.cinemaHallModel.find().sort({ name: 1 }).exec();
    return halls.map((hall) => this.toResponse(hall));
  }

  private toResponse(hall: CinemaHallDocument): CinemaHallResponse {
    return {
      id: hall._id.toString(),
      name: hall.name,
      rows: hall.rows,
      seatsInRow: hall.seatsInRow,
      capacity: hallCapacity(hall),
    };
  }
}
