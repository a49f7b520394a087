// MovieSession Schema - suất chiếu: phim nào, phòng nào, giờ chiếu
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type MovieSessionDocument = HydratedDocument<MovieSession>;

@Schema({
  timestamps: true,
  collection: 'movie_sessions',
})
export class MovieSession {
  // Thời gian bắt đầu suất chiếu
  @Prop({ type: Date, required: true, index: true })
  showTime!: Date;

  // Phim chiếu (bắt buộc, service kiểm tra tồn tại trước khi lưu)
  @Prop({ type: Types.ObjectId, ref: 'Movie', required: true })
  movie!: Types.ObjectId;

  // Phòng chiếu
  @Prop({ type: Types.ObjectId, ref: 'CinemaHall', required: true })
  cinemaHall!: Types.ObjectId;
}

export const MovieSessionSchema = SchemaFactory.createForClass(MovieSession);

// Index để query suất chiếu của một phim theo thời gian
MovieSessionSchema.index({ movie: 1, showTime: 1 });
