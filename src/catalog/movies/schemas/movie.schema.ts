// Movie Schema - thông tin phim trong catalog
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument, Types } from 'mongoose';

export type MovieDocument = HydratedDocument<Movie>;

@Schema({ collection: 'movies', timestamps: true })
export class Movie {
  @Prop({ required: true, trim: true })
  title!: string;

  @Prop({ required: true })
  description!: string;

  // Thời lượng phim (phút)
  @Prop({ required: true, min: 1 })
  duration!: number;

  // Quan hệ nhiều-nhiều: phim giữ danh sách id, tra ngược bằng index bên dưới
  @Prop({ type: [{ type: Types.ObjectId, ref: 'Genre' }], default: [] })
  genres!: Types.ObjectId[];

  @Prop({ type: [{ type: Types.ObjectId, ref: 'Actor' }], default: [] })
  actors!: Types.ObjectId[];

  // Đường dẫn poster tương đối so với MEDIA_ROOT, null = chưa có ảnh
  // Chỉ được set qua POST /movies/:id/upload-image
  @Prop({ type: String, default: null })
  image?: string | null;
}

export const MovieSchema = SchemaFactory.createForClass(Movie);

// Index để filter phim theo thể loại / diễn viên
MovieSchema.index({ genres: 1 });
MovieSchema.index({ actors: 1 });
