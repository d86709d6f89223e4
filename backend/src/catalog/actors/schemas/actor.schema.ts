// Actor Schema - diễn viên
import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type ActorDocument = HydratedDocument<Actor>;

@Schema({ collection: 'actors', timestamps: false })
export class Actor {
  @Prop({ required: true, trim: true })
  firstName!: string;

  @Prop({ required: true, trim: true })
  lastName!: string;
}

export const ActorSchema = SchemaFactory.createForClass(Actor);

// "Tom" + "Hardy" → "Tom Hardy"
export function actorFullName(actor: Pick<Actor, 'firstName' | 'lastName'>) {
  return `${actor.firstName} ${actor.lastName}`;
}
