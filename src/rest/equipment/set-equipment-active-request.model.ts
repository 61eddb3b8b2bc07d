import {Model, model, property} from '@loopback/repository';

@model()
export class SetEquipmentActiveRequest extends Model {
  @property({
    type: 'boolean',
    required: true,
  })
  active!: boolean;

  constructor(data?: Partial<SetEquipmentActiveRequest>) {
    super(data);
  }
}
