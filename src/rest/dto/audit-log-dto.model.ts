import {model, Model, property} from '@loopback/repository';
import {AuditAction, AuditDetails} from '../../models';

@model()
export class AuditLogDto extends Model {
  @property({
    type: 'number',
    required: true,
  })
  id!: number;

  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      enum: Object.values(AuditAction),
    },
  })
  action!: AuditAction;

  @property({
    type: 'string',
    required: true,
  })
  entityType!: string;

  @property({
    type: 'number',
  })
  entityId?: number;

  @property({
    type: 'number',
  })
  actorId?: number;

  @property({
    type: 'object',
  })
  details?: AuditDetails;

  @property({
    type: 'string',
  })
  ipAddress?: string;

  @property({
    type: 'string',
  })
  userAgent?: string;

  @property({
    type: 'date',
    required: true,
  })
  createdAt!: Date;

  constructor(data?: Partial<AuditLogDto>) {
    super(data);
  }
}
