import { Types } from 'mongoose';

export interface CinemaHallRecord {
  _id: Types.ObjectId;
  name: string;
  rows: number;
  seatsInRow: number;
}

export interface CinemaHallResponse {
  id: string;
  name: string;
  rows: number;
  seats_in_row: number;
  capacity: number;
}

// Sức chứa = số hàng × số ghế mỗi hàng
export const hallCapacity = (
  hall: Pick<CinemaHallRecord, 'rows' | 'seatsInRow'>,
) => hall.rows * hall.seatsInRow;

export const presentCinemaHall = (
  hall: CinemaHallRecord,
): CinemaHallResponse => ({
  id: hall._id.toString(),
  name: hall.name,
  rows: hall.rows,
  seats_in_row: hall.seatsInRow,
  capacity: hallCapacity(hall),
});
