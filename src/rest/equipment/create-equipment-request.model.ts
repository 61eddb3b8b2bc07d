import {Model, model, property} from '@loopback/repository';
import {EquipmentCategory, EquipmentType} from '../../models';

@model()
export class CreateEquipmentRequest extends Model {
  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      minLength: 1,
      maxLength: 255,
    },
  })
  name!: string;

  @property({
    type: 'string',
    jsonSchema: {
      maxLength: 1024,
    },
  })
  description?: string;

  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      enum: Object.values(EquipmentType),
    },
  })
  type!: EquipmentType;

  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      enum: Object.values(EquipmentCategory),
    },
  })
  category!: EquipmentCategory;

  @property({
    type: 'string',
    jsonSchema: {
      maxLength: 255,
    },
  })
  serialNumber?: string;

  @property({
    type: 'string',
    jsonSchema: {
      maxLength: 255,
    },
  })
  qrCode?: string;

  @property({
    type: 'string',
    jsonSchema: {
      maxLength: 1024,
    },
  })
  imageUrl?: string;

  constructor(data?: Partial<CreateEquipmentRequest>) {
    super(data);
  }
}
