// CinemaHallsService - danh sách và tạo phòng chiếu
import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { CinemaHall, CinemaHallDocument } from './schemas/cinema-hall.schema';
import { CreateCinemaHallDto } from './dto/create-cinema-hall.dto';
import {
  CinemaHallResponse,
  presentCinemaHall,
} from './cinema-hall.presenter';

@Injectable()
export class CinemaHallsService {
  private readonly logger = new Logger(CinemaHallsService.name);

  constructor(
    @InjectModel(CinemaHall.name)
    private readonly cinemaHallModel: Model<CinemaHallDocument>,
  ) {}

  // Tạo phòng chiếu
  async create(dto: CreateCinemaHallDto): Promise<CinemaHallResponse> {
    const hall = await this.cinemaHallModel.create({
      name: dto.name,
      rows: dto.rows,
      seatsInRow: dto.seats_in_row,
    });
    this.logger.log(
      `Created cinema hall "${hall.name}" (${hall.rows}x${hall.seatsInRow})`,
    );
    return presentCinemaHall(hall);
  }

  // Danh sách phòng chiếu
  async findAll(): Promise<CinemaHallResponse[]> {
    const halls = await this.cinemaHallModel
      .find()
      .sort({ _id: 1 })
      .lean()
      .exec();
    return halls.map(presentCinemaHall);
  }
}
