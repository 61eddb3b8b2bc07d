import {model, Model, property} from '@loopback/repository';
import {EquipmentCategory, EquipmentType} from '../../models';
import {AuditFieldsDto} from './audit-fields-dto.model';

@model()
export class EquipmentDto extends Model {
  @property({
    type: 'number',
    required: true,
  })
  id!: number;

  @property({
    type: 'string',
    required: true,
  })
  name!: string;

  @property({
    type: 'string',
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
  })
  serialNumber?: string;

  @property({
    type: 'string',
  })
  qrCode?: string;

  @property({
    type: 'string',
  })
  imageUrl?: string;

  @property({
    type: 'boolean',
    required: true,
  })
  active!: boolean;

  @property({
    type: AuditFieldsDto,
  })
  audit!: AuditFieldsDto;

  constructor(data?: Partial<EquipmentDto>) {
    super(data);
  }
}
