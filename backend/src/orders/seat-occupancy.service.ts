// SeatOccupancyService - đọc ghế đã có người đặt từ collection orders
// Được khai báo provider ở cả MovieSessionsModule (ticketsAvailable, takenPlaces)
// và OrdersModule (kiểm tra ghế trùng khi tạo order)

import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { Order, OrderDocument } from './schemas/order.schema';

export interface TakenPlace {
  movieSession: string;
  row: number;
  seat: number;
}

@Injectable()
export class SeatOccupancyService {
  constructor(
    @InjectModel(Order.name) private readonly orderModel: Model<OrderDocument>,
  ) {}

  // Số vé đã bán theo từng suất chiếu: Map<sessionId, count>
  async countTickets(sessionIds: Types.ObjectId[]): Promise<Map<string, number>> {
    if (sessionIds.length === 0) {
      return new Map();
    }

    const rows = await this.orderModel
      .aggregate<{ _id: Types.ObjectId; count: number }>([
        { $match: { 'tickets.movieSession': { $in: sessionIds } } },
        { $unwind: '$tickets' },
        { $match: { 'tickets.movieSession': { $in: sessionIds } } },
        { $group: { _id: '$tickets.movieSession', count: { $sum: 1 } } },
      ])
      .exec();

    return new Map(rows.map((row) => [row._id.toString(), row.count]));
  }

  // Danh sách ghế đã có người đặt của các suất chiếu, sắp theo hàng rồi số ghế
  async findTakenPlaces(sessionIds: Types.ObjectId[]): Promise<TakenPlace[]> {
    if (sessionIds.length === 0) {
      return [];
    }

    const rows = await this.orderModel
      .aggregate<{ movieSession: Types.ObjectId; row: number; seat: number }>([
        { $match: { 'tickets.movieSession': { $in: sessionIds } } },
        { $unwind: '$tickets' },
        { $match: { 'tickets.movieSession': { $in: sessionIds } } },
        {
          $project: {
            _id: 0,
            movieSession: '$tickets.movieSession',
            row: '$tickets.row',
            seat: '$tickets.seat',
          },
        },
        { $sort: { row: 1, seat: 1 } },
      ])
      .exec();

    return rows.map((row) => ({
      movieSession: row.movieSession.toString(),
      row: row.row,
      seat: row.seat,
    }));
  }
}
