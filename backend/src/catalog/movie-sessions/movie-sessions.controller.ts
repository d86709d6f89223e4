// MovieSessionsController - REST endpoints cho suất chiếu (/api/cinema/movie-sessions)
import {
  Controller,
  Get,
  Post,
  Put,
  Patch,
  Delete,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  UseGuards,
} from '@nestjs/common';
import { MovieSessionsService } from './movie-sessions.service';
import { CreateMovieSessionDto } from './dto/create-movie-session.dto';
import { UpdateMovieSessionDto } from './dto/update-movie-session.dto';
import { MovieSessionFilterDto } from './dto/movie-session-filter.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { AdminOrReadOnlyGuard } from '../../auth/guards/admin-or-read-only.guard';

@Controller('cinema/movie-sessions')
@UseGuards(JwtAuthGuard, AdminOrReadOnlyGuard)
export class MovieSessionsController {
  constructor(private readonly movieSessionsService: MovieSessionsService) {}

  // Danh sách suất chiếu - public, VD: ?date=2026-06-02&movie=<id>
  @Get()
  findAll(@Query() query: MovieSessionFilterDto) {
    return this.movieSessionsService.findAll(query);
  }

  // Chi tiết suất chiếu (kèm ghế đã đặt) - public
  @Get(':id')
  findOne(@Param('id') id: string) {
    return this.movieSessionsService.findOne(id);
  }

  // Tạo suất chiếu - staff
  @Post()
  create(@Body() dto: CreateMovieSessionDto) {
    return this.movieSessionsService.create(dto);
  }

  // Thay toàn bộ suất chiếu - staff
  @Put(':id')
  replace(@Param('id') id: string, @Body() dto: CreateMovieSessionDto) {
    return this.movieSessionsService.update(id, dto);
  }

  // Cập nhật một phần - staff
  @Patch(':id')
  update(@Param('id') id: string, @Body() dto: UpdateMovieSessionDto) {
    return this.movieSessionsService.update(id, dto);
  }

  // Xoá - staff
  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id') id: string) {
    return this.movieSessionsService.remove(id);
  }
}
