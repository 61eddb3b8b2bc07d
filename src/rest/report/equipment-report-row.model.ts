import {model, Model, property} from '@loopback/repository';
import {AccessSessionStatus} from '../../models';

@model()
export class EquipmentReportRow extends Model {
  @property({
    type: 'number',
    required: true,
  })
  sessionId!: number;

  @property({
    type: 'number',
    required: true,
  })
  equipmentId!: number;

  @property({
    type: 'string',
  })
  equipmentName?: string;

  @property({
    type: 'string',
  })
  qrCode?: string;

  @property({
    type: 'string',
  })
  serialNumber?: string;

  @property({
    type: 'number',
    required: true,
  })
  actorId!: number;

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
    required: true,
    jsonSchema: {
      enum: Object.values(AccessSessionStatus),
    },
  })
  status!: AccessSessionStatus;

  @property({
    type: 'number',
    required: true,
  })
  daysInside!: number;

  @property({
    type: 'boolean',
    required: true,
  })
  isExpired!: boolean;

  constructor(data?: Partial<EquipmentReportRow>) {
    super(data);
  }
}
