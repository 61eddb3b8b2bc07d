import {model, Model, property} from '@loopback/repository';
import {AccessSessionStatus} from '../../models';

/**
 * An open session together with the equipment it belongs to.
 */
@model()
export class ActiveEquipmentDto extends Model {
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
    required: true,
  })
  expectedExitAt!: Date;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
    },
  })
  daysInside!: number;

  @property({
    type: 'boolean',
    required: true,
  })
  isExpired!: boolean;

  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      enum: Object.values(AccessSessionStatus),
    },
  })
  status!: AccessSessionStatus;

  constructor(data?: Partial<ActiveEquipmentDto>) {
    super(data);
  }
}
