// ActorsController - /api/cinema/actors
import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { ActorsService } from './actors.service';
import { CreateActorDto } from './dto/create-actor.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { AdminOrReadOnlyGuard } from '../../auth/guards/admin-or-read-only.guard';

@Controller('cinema/actors')
@UseGuards(JwtAuthGuard, AdminOrReadOnlyGuard)
export class ActorsController {
  constructor(private readonly actorsService: ActorsService) {}

  // Danh sách diễn viên - public
  @Get()
  findAll() {
    return this.actorsService.findAll();
  }

  // Thêm diễn viên - staff
  @Post()
  create(@Body() dto: CreateActorDto) {
    return this.actorsService.create(dto);
  }
}
