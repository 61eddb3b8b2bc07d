import {model, Model, property} from '@loopback/repository';
import {AccessSessionStatus, AccessType} from '../../models';
import {AuditFieldsDto} from './audit-fields-dto.model';

@model()
export class AccessSessionDto extends Model {
  @property({
    type: 'number',
    required: true,
  })
  id!: number;

  @property({
    type: 'number',
    required: true,
  })
  equipmentId!: number;

  @property({
    type: 'number',
    required: true,
  })
  actorId!: number;

  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      enum: Object.values(AccessType),
    },
  })
  accessType!: AccessType;

  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      enum: Object.values(AccessSessionStatus),
    },
  })
  status!: AccessSessionStatus;

  @property({
    type: 'date',
    required: true,
  })
  entryAt!: Date;

  @property({
    type: 'date',
  })
  exitAt?: Date;

  @property({
    type: 'date',
    required: true,
  })
  expectedExitAt!: Date;

  @property({
    type: 'string',
  })
  notes?: string;

  @property({
    type: AuditFieldsDto,
  })
  audit!: AuditFieldsDto;

  constructor(data?: Partial<AccessSessionDto>) {
    super(data);
  }
}
