// ActorsService - danh sách và tạo mới diễn viên
import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { Actor, ActorDocument, actorFullName } from './schemas/actor.schema';
import { CreateActorDto } from './dto/create-actor.dto';

export interface ActorResponse {
  id: string;
  firstName: string;
  lastName: string;
  fullName: string;
}

@Injectable()
export class ActorsService {
  constructor(
    @InjectModel(Actor.name) private readonly actorModel: Model<ActorDocument>,
  ) {}

  async create(dto: CreateActorDto): Promise<ActorResponse> {
    const actor = await new this.actorModel(dto).save();
    return this.toResponse(actor);
  }

  async findAll(): Promise<ActorResponse[]> {
    const actors = await this.actorModel
      .find()
      .sort({ lastName: 1, firstName: 1 })
      .exec();
    return actors.map((actor) => this.toResponse(actor));
  }

  private toResponse(actor: ActorDocument): ActorResponse {
    return {
      id: actor._id.toString(),
      firstName: actor.firstName,
      lastName: actor.lastName,
      fullName: actorFullName(actor),
    };
  }
}
