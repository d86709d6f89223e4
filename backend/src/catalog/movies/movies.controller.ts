// MoviesController - REST endpoints cho phim (/api/cinema/movies)
import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Query,
  HttpCode,
  HttpStatus,
  ParseFilePipe,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { MoviesService } from './movies.service';
import { CreateMovieDto } from './dto/create-movie.dto';
import { MovieFilterDto } from './dto/movie-filter.dto';
import { ImageFileValidator } from './validators/image-file.validator';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { AdminOrReadOnlyGuard } from '../../auth/guards/admin-or-read-only.guard';

@Controller('cinema/movies')
// Guards chạy trước interceptor: request bị chặn (401/403) thì file chưa được đọc vào
@UseGuards(JwtAuthGuard, AdminOrReadOnlyGuard)
export class MoviesController {
  constructor(private readonly moviesService: MoviesService) {}

  // Danh sách phim - public, VD: ?title=ring&genres=<id>&actors=<id>
  @Get()
  findAll(@Query() query: MovieFilterDto) {
    return this.moviesService.findAll(query);
  }

  // Chi tiết phim - public
  @Get(':id')
  findOne(@Param('id') id: string) {
    return this.moviesService.findOne(id);
  }

  // Tạo phim mới - chỉ staff
  // Nhận cả JSON lẫn multipart: multer đọc các field text, file "image" gửi kèm bị bỏ qua
  // (ảnh chỉ set qua upload-image)
  @Post()
  @UseInterceptors(FileInterceptor('image'))
  create(@Body() dto: CreateMovieDto) {
    return this.moviesService.create(dto);
  }

  /**
   * POST /api/cinema/movies/:id/upload-image
   * multipart/form-data, field "image" - chỉ staff
   * Không có file hoặc file không phải ảnh → 400
   */
  @Post(':id/upload-image')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('image'))
  uploadImage(
    @Param('id') id: string,
    @UploadedFile(
      new ParseFilePipe({ validators: [new ImageFileValidator()] }),
    )
    file: Express.Multer.File,
  ) {
    return this.moviesService.uploadImage(id, file);
  }
}
