// ActorsService - danh sách và tạo diễn viên
import { Injectable, Logger } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Actor, ActorDocument } from './schemas/actor.schema';
import { CreateActorDto } from './dto/create-actor.dto';
import { ActorResponse, presentActor } from './actor.presenter';

@Injectable()
export class ActorsService {
  private readonly logger = new Logger(ActorsService.name);

  constructor(
    @InjectModel(Actor.name) private readonly actorModel: Model<ActorDocument>,
  ) {}

  async create(dto: CreateActorDto): Promise<ActorResponse> {
    const actor = await this.actorModel.create({
      firstName: dto.first_name,
      lastName: dto.last_name,
    });
    this.logger.log(`Created actor ${actor._id.toString()}`);
    return presentActor(actor);
  }

  async findAll(): Promise<ActorResponse[]> {
    const actors = await this.actorModel.find().sort({ _id: 1 }).lean().exec();
    return actors.map(presentActor);
  }
}
