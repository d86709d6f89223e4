// OrdersService - tạo đơn đặt vé và xem danh sách đơn của chính user
import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model, Types } from 'mongoose';
import { Order, OrderDocument } from './schemas/order.schema';
import {
  MovieSession,
  MovieSessionDocument,
} from '../catalog/movie-sessions/schemas/movie-session.schema';
import type { CinemaHall } from '../catalog/cinema-halls/schemas/cinema-hall.schema';
import { CreateOrderDto } from './dto/create-order.dto';
import { SeatOccupancyService } from './seat-occupancy.service';
import { assertPlaceInHall, assertPlacesFree, placeKey } from './ticket-rules';
import { uniqueIds } from '../common/utils/object-id';
import type { Paginated } from '../common/dto/pagination-query.dto';

// Suất chiếu kèm phòng chiếu (để kiểm tra row/seat) và tên phim (để hiển thị)
// populate trả về null nếu document được tham chiếu đã bị xoá
type SessionWithHall = {
  _id: Types.ObjectId;
  showTime: Date;
  movie: { _id: Types.ObjectId; title: string } | null;
  cinemaHall: (CinemaHall & { _id: Types.ObjectId }) | null;
};

type PopulatedOrder = {
  _id: Types.ObjectId;
  createdAt: Date;
  tickets: Array<{ row: number; seat: number; movieSession: SessionWithHall | null }>;
};

export interface OrderTicketResponse {
  row: number;
  seat: number;
  movieSession: {
    id: string;
    showTime: Date;
    movieTitle: string;
    cinemaHallName: string;
  } | null;
}

export interface OrderResponse {
  id: string;
  createdAt: Date;
  tickets: OrderTicketResponse[];
}

const SESSION_POPULATE = [
  { path: 'movie', select: 'title' },
  { path: 'cinemaHall', select: 'name rows seatsInRow' },
];

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @InjectModel(Order.name) private readonly orderModel: Model<OrderDocument>,
    @InjectModel(MovieSession.name)
    private readonly sessionModel: Model<MovieSessionDocument>,
    private readonly seatOccupancy: SeatOccupancyService,
  ) {}

  /**
   * Danh sách đơn của user, mới nhất trước (có phân trang)
   * Suất chiếu đã bị xoá thì movieSession = null
   */
  async findAllForUser(
    userId: string,
    page = 1,
    limit = 10,
  ): Promise<Paginated<OrderResponse>> {
    const filter = { user: new Types.ObjectId(userId) };
    const skip = (page - 1) * limit;

    const [orders, total] = await Promise.all([
      this.orderModel
        .find(filter)
        .sort({ createdAt: -1 })
        .skip(skip)
        .limit(limit)
        .populate({ path: 'tickets.movieSession', populate: SESSION_POPULATE })
        .lean<PopulatedOrder[]>()
        .exec(),
      this.orderModel.countDocuments(filter).exec(),
    ]);

    return {
      data: orders.map((order) => this.toResponse(order)),
      pagination: {
        page,
        limit,
        total,
        totalPages: Math.ceil(total / limit),
      },
    };
  }

  /**
   * Tạo order cho user
   * - Mọi suất chiếu phải tồn tại (400)
   * - row/seat phải nằm trong phòng chiếu (400)
   * - Ghế chưa có ai đặt và không trùng trong cùng order (409)
   */
  async create(userId: string, dto: CreateOrderDto): Promise<OrderResponse> {
    const sessionIds = uniqueIds(dto.tickets.map((t) => t.movieSession));
    const sessions = await this.sessionModel
      .find({ _id: { $in: sessionIds } })
      .populate(SESSION_POPULATE)
      .lean<SessionWithHall[]>()
      .exec();

    const sessionsById = new Map(
      sessions.map((session) => [session._id.toString(), session]),
    );

    for (const ticket of dto.tickets) {
      const session = sessionsById.get(ticket.movieSession);
      if (!session || !session.cinemaHall) {
        throw new BadRequestException(
          `movieSession: "${ticket.movieSession}" does not exist`,
        );
      }
      assertPlaceInHall(ticket, session.cinemaHall);
    }

    const taken = await this.seatOccupancy.findTakenPlaces(
      sessions.map((session) => session._id),
    );
    assertPlacesFree(
      dto.tickets,
      new Set(taken.map((place) => placeKey(place.movieSession, place))),
    );

    const order = await new this.orderModel({
      user: new Types.ObjectId(userId),
      tickets: dto.tickets.map((ticket) => ({
        row: ticket.row,
        seat: ticket.seat,
        movieSession: new Types.ObjectId(ticket.movieSession),
      })),
    }).save();

    this.logger.log(
      `User ${userId} created order ${order._id.toString()} with ${dto.tickets.length} ticket(s)`,
    );

    return {
      id: order._id.toString(),
      createdAt: order.createdAt,
      tickets: dto.tickets.map((ticket) => ({
        row: ticket.row,
        seat: ticket.seat,
        movieSession: this.toSessionSummary(sessionsById.get(ticket.movieSession)),
      })),
    };
  }

  private toResponse(order: PopulatedOrder): OrderResponse {
    return {
      id: order._id.toString(),
      createdAt: order.createdAt,
      tickets: order.tickets.map((ticket) => ({
        row: ticket.row,
        seat: ticket.seat,
        movieSession: this.toSessionSummary(ticket.movieSession),
      })),
    };
  }

  private toSessionSummary(
    session: SessionWithHall | null | undefined,
  ): OrderTicketResponse['movieSession'] {
    if (!session) {
      return null;
    }
    return {
      id: session._id.toString(),
      showTime: session.showTime,
      movieTitle: session.movie?.title ?? '',
      cinemaHallName: session.cinemaHall?.name ?? '',
    };
  }
}
