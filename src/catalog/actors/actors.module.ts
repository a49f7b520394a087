// ActorsModule - gom controller/service cho diễn viên
import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ActorsService } from './actors.service';
import { ActorsController } from './actors.controller';
import { Actor, ActorSchema } from './schemas/actor.schema';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: Actor.name, schema: ActorSchema }]),
  ],
  controllers: [ActorsController],
  providers: [ActorsService],
  exports: [ActorsService, MongooseModule],
})
export class ActorsModule {}
