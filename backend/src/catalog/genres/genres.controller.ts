// GenresController - /api/cinema/genres
// Đọc: ai cũng được. Ghi: chỉ staff (AdminOrReadOnlyGuard)
import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { GenresService } from './genres.service';
import { CreateGenreDto } from './dto/create-genre.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { AdminOrReadOnlyGuard } from '../../auth/guards/admin-or-read-only.guard';

@Controller('cinema/genres')
@UseGuards(JwtAuthGuard, AdminOrReadOnlyGuard)
export class GenresController {
  constructor(private readonly genresService: GenresService) {}

  @Get()
  findAll() {
    return this.genresService.findAll();
  }

  @Post()
  create(@Body() dto: CreateGenreDto) {
    return this.genresService.create(dto);
  }
}
