import {model, Model, property} from '@loopback/repository';

@model()
export class ActorActivityRow extends Model {
  @property({
    type: 'number',
    required: true,
  })
  actorId!: number;

  @property({
    type: 'number',
    required: true,
  })
  totalActions!: number;

  @property({
    type: 'date',
    required: true,
  })
  lastActionAt!: Date;

  constructor(data?: Partial<ActorActivityRow>) {
    super(data);
  }
}
