// GenresController - REST endpoints cho thể loại phim
import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { GenresService } from './genres.service';
import { CreateGenreDto } from './dto/create-genre.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../auth/guards/roles.guard';
import { Roles } from '../../auth/decorators/roles.decorator';
import { ADMIN_ROLE } from '../../users/schemas/user.schema';

@Controller('genres')
@UseGuards(JwtAuthGuard, RolesGuard)
export class GenresController {
  constructor(private readonly genresService: GenresService) {}

  // Tạo thể loại - chỉ admin
  @Post()
  @Roles(ADMIN_ROLE)
  create(@Body() dto: CreateGenreDto) {
    return this.genresService.create(dto);
  }

  // Danh sách thể loại - user đã đăng nhập
  @Get()
  findAll() {
    return this.genresService.findAll();
  }
}
