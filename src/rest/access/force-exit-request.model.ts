import {Model, model, property} from '@loopback/repository';

@model()
export class ForceExitRequest extends Model {
  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      maxLength: 2000,
    },
  })
  reason!: string;

  constructor(data?: Partial<ForceExitRequest>) {
    super(data);
  }
}
