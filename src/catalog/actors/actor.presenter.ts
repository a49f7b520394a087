import { Types } from 'mongoose';

export interface ActorRecord {
  _id: Types.ObjectId;
  firstName: string;
  lastName: string;
}

export interface ActorResponse {
  id: string;
  first_name: string;
  last_name: string;
  full_name: string;
}

// full_name = "first_name last_name", tính lúc đọc, không lưu DB
export const actorFullName = (
  actor: Pick<ActorRecord, 'firstName' | 'lastName'>,
) => `${actor.firstName} ${actor.lastName}`;

export const presentActor = (actor: ActorRecord): ActorResponse => ({
  id: actor._id.toString(),
  first_name: actor.firstName,
  last_name: actor.lastName,
  full_name: actorFullName(actor),
});
