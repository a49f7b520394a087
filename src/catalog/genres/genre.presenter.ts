import { Types } from 'mongoose';

export interface GenreRecord {
  _id: Types.ObjectId;
  name: string;
}

export interface GenreResponse {
  id: string;
  name: string;
}

export const presentGenre = (genre: GenreRecord): GenreResponse => ({
  id: genre._id.toString(),
  name: genre.name,
});
