// CinemaHall Schema - thông tin phòng chiếu
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type CinemaHallDocument = HydratedDocument<CinemaHall>;

@Schema({ collection: 'cinema_halls', timestamps: false })
export class CinemaHall {
  // Tên phòng chiếu (Blue, IMAX Screen, Screen 01...)
  @Prop({ required: true, trim: true })
  name!: string;

  // Số hàng ghế
  @Prop({ required: true, min: 1 })
  rows!: number;

  // Số ghế mỗi hàng; sức chứa = rows × seatsInRow (tính lúc đọc)
  @Prop({ required: true, min: 1 })
  seatsInRow!: number;
}

export const CinemaHallSchema = SchemaFactory.createForClass(CinemaHall);
