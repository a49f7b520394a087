// MovieSessionsController - REST endpoints cho suất chiếu
import {
  Controller,
  Get,
  Post,
  Body,
  Param,
  Patch,
  Delete,
  Query,
  UseGuards,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import { MovieSessionsService } from './movie-sessions.service';
import { CreateMovieSessionDto } from './dto/create-movie-session.dto';
import { UpdateMovieSessionDto } from './dto/update-movie-session.dto';
import { MovieSessionFilterDto } from './dto/movie-session-filter.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../auth/guards/roles.guard';
import { Roles } from '../../auth/decorators/roles.decorator';
import { ParseObjectIdPipe } from '../../common/pipes/parse-object-id.pipe';
import { ADMIN_ROLE } from '../../users/schemas/user.schema';

@Controller('movie-sessions')
@UseGuards(JwtAuthGuard, RolesGuard)
export class MovieSessionsController {
  constructor(private readonly movieSessionsService: MovieSessionsService) {}

  // Tạo suất chiếu - chỉ admin
  @Post()
  @Roles(ADMIN_ROLE)
  create(@Body() dto: CreateMovieSessionDto) {
    return this.movieSessionsService.create(dto);
  }

  // Danh sách suất chiếu - user đã đăng nhập
  @Get()
  findAll(@Query() filters: MovieSessionFilterDto) {
    return this.movieSessionsService.findAll(filters);
  }

  // Chi tiết suất chiếu
  @Get(':id')
  findOne(@Param('id', ParseObjectIdPipe) id: string) {
    return this.movieSessionsService.findOne(id);
  }

  // Cập nhật suất chiếu - chỉ admin
  @Patch(':id')
  @Roles(ADMIN_ROLE)
  update(
    @Param('id', ParseObjectIdPipe) id: string,
    @Body() dto: UpdateMovieSessionDto,
  ) {
    return this.movieSessionsService.update(id, dto);
  }

  // Xoá suất chiếu - chỉ admin
  @Delete(':id')
  @Roles(ADMIN_ROLE)
  @HttpCode(HttpStatus.NO_CONTENT)
  remove(@Param('id', ParseObjectIdPipe) id: string) {
    return this.movieSessionsService.remove(id);
  }
}
