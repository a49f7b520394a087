// ActorsController - REST endpoints cho diễn viên
import { Body, Controller, Get, Post, UseGuards } from '@nestjs/common';
import { ActorsService } from './actors.service';
import { CreateActorDto } from './dto/create-actor.dto';
import { JwtAuthGuard } from '../../auth/guards/jwt-auth.guard';
import { RolesGuard } from '../../auth/guards/roles.guard';
import { Roles } from '../../auth/decorators/roles.decorator';
import { ADMIN_ROLE } from '../../users/schemas/user.schema';

@Controller('actors')
@UseGuards(JwtAuthGuard, RolesGuard)
export class ActorsController {
  constructor(private readonly actorsService: ActorsService) {}

  // Thêm diễn viên - chỉ admin
  @Post()
  @Roles(ADMIN_ROLE)
  create(@Body() dto: CreateActorDto) {
    return this.actorsService.create(dto);
  }

  // Danh sách diễn viên - user đã đăng nhập
  @Get()
  findAll() {
    return this.actorsService.findAll();
  }
}
