// OrdersController - đơn đặt vé của user đang đăng nhập (/api/cinema/orders)
// Không dùng AdminOrReadOnlyGuard: user thường cũng phải tạo được order của mình

import { Body, Controller, Get, Post, Query, UseGuards } from '@nestjs/common';
import { OrdersService } from './orders.service';
import { CreateOrderDto } from './dto/create-order.dto';
import { PaginationQueryDto } from '../common/dto/pagination-query.dto';
import { JwtAuthGuard } from '../auth/guards/jwt-auth.guard';
import { AuthenticatedGuard } from '../auth/guards/authenticated.guard';
import { CurrentUser } from '../auth/decorators/current-user.decorator';
import type { Caller } from '../auth/interfaces/caller.interface';

@Controller('cinema/orders')
@UseGuards(JwtAuthGuard, AuthenticatedGuard)
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  // GET /api/cinema/orders?page=1&limit=10
  @Get()
  findAll(@CurrentUser() caller: Caller, @Query() query: PaginationQueryDto) {
    return this.ordersService.findAllForUser(
      caller.userId,
      query.page,
      query.limit,
    );
  }

  // POST /api/cinema/orders
  @Post()
  create(@CurrentUser() caller: Caller, @Body() dto: CreateOrderDto) {
    return this.ordersService.create(caller.userId, dto);
  }
}
