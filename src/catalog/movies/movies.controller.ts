// MoviesController - REST endpoints cho phim
import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Delete,
  Query,
  UseGuards,
  UseInterceptors,
  UploadedFile,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { MoviesService } from './movies.service';
import { CreateMovieDto } from './dto/create-movie.dto';
import { MovieFilterDto } from './dto/movie-filter.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../auth/guards/roles.guard';
import { Roles } from '../../auth/decorators/roles.decorator';
import { ParseObjectIdPipe } from '../../common/pipes/parse-object-id.pipe';
import { ADMIN_ROLE } from '../../users/schemas/user.schema';

// Tất cả route đều cần đăng nhập; route ghi cần thêm role admin
@Controller('movies')
@UseGuards(JwtAuthGuard, RolesGuard)
export class MoviesController {
  constructor(private readonly moviesService: MoviesService) {}

  // Tạo phim mới - chỉ admin
  // FileInterceptor để nhận được multipart; file "image" (nếu có) không được lưu
  @Post()
  @Roles(ADMIN_ROLE)
  @UseInterceptors(FileInterceptor('image'))
  create(
    @Body() dto: CreateMovieDto,
    @UploadedFile() image?: Express.Multer.File,
  ) {
    return this.moviesService.create(dto, image);
  }

  // Danh sách phim, lọc theo ?title=&genres=&actors=
  @Get()
  findAll(@Query() filters: MovieFilterDto) {
    return this.moviesService.findAll(filters);
  }

  // Chi tiết phim
  @Get(':id')
  findOne(@Param('id', ParseObjectIdPipe) id: string) {
    return this.moviesService.findOne(id);
  }

  // Upload poster (multipart, field "image") - chỉ admin
  @Post(':id/upload-image')
  @Roles(ADMIN_ROLE)
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileInterceptor('image'))
  uploadImage(
    @Param('id', ParseObjectIdPipe) id: string,
    @UploadedFile() image?: Express.Multer.File,
  ) {
    return this.moviesService.uploadImage(id, image);
  }

  // Gỡ poster - chỉ admin
  @Delete(':id/image')
  @Roles(ADMIN_ROLE)
  removeImage(@Param('id', ParseObjectIdPipe) id: string) {
    return this.moviesService.removeImage(id);
  }
}
