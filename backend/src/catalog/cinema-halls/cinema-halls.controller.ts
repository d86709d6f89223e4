// CinemaHallsController - /api/cinema/cinema-halls
import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { CinemaHallsService } from './cinema-halls.service';
import { CreateCinemaHallDto } from './dto/create-cinema-hall.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { AdminOrReadOnlyGuard } from '../../auth/guards/admin-or-read-only.guard';

@Controller('cinema/cinema-halls')
@UseGuards(JwtAuthGuard, AdminOrReadOnlyGuard)
export class CinemaHallsController {
  constructor(private readonly cinemaHallsService: CinemaHallsService) {}

  @Get()
  findAll() {
    return this.cinemaHallsService.findAll();
  }

  @Post()
  create(@Body() dto: CreateCinemaHallDto) {
    return this.cinemaHallsService.create(dto);
  }
}
