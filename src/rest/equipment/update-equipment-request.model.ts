import {Model, model, property} from '@loopback/repository';

@model()
export class UpdateEquipmentRequest extends Model {
  @property({
    type: 'string',
    jsonSchema: {
      maxLength: 255,
    },
  })
  name?: string;

  @property({
    type: 'string',
    jsonSchema: {
      maxLength: 1024,
    },
  })
  description?: string;

  constructor(data?: Partial<UpdateEquipmentRequest>) {
    super(data);
  }
}
