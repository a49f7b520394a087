// Genre Schema - thể loại phim (Action, Comedy...)
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type GenreDocument = HydratedDocument<Genre>;

@Schema({ collection: 'genres', timestamps: false })
export class Genre {
  // Tên thể loại, không được trùng
  @Prop({ required: true, unique: true, trim: true })
  name!: string;
}

export const GenreSchema = SchemaFactory.createForClass(Genre);
