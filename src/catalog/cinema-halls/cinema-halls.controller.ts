// CinemaHallsController - REST endpoints cho phòng chiếu
import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { CinemaHallsService } from './cinema-halls.service';
import { CreateCinemaHallDto } from './dto/create-cinema-hall.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../auth/guards/roles.guard';
import { Roles } from '../../auth/decorators/roles.decorator';
import { ADMIN_ROLE } from '../../users/schemas/user.schema';

@Controller('cinema-halls')
@UseGuards(JwtAuthGuard, RolesGuard)
export class CinemaHallsController {
  constructor(private readonly cinemaHallsService: CinemaHallsService) {}

  // Tạo phòng chiếu - chỉ admin
  @Post()
  @Roles(ADMIN_ROLE)
  create(@Body() dto: CreateCinemaHallDto) {
    return this.cinemaHallsService.create(dto);
  }

  // Danh sách phòng chiếu - user đã đăng nhập
  @Get()
  findAll() {
    return this.cinemaHallsService.findAll();
  }
}
