import {belongsTo, model, property} from '@loopback/repository';
import {Equipment} from './equipment.model';
import {AuditEntity} from './proto/audit-entity.model';

export enum AccessSessionStatus {
  ACTIVE = 'ACTIVE',
  COMPLETED = 'COMPLETED',
  EXPIRED = 'EXPIRED',
  BLOCKED = 'BLOCKED',
}

/**
 * Kind of the action that last moved the session.
 */
export enum AccessType {
  ENTRY = 'ENTRY',
  EXIT = 'EXIT',
}

@model({
  name: 'acc_access_session',
  settings: {
    indexes: {
      equipmentStatus: {
        keys: {equipmentId: 1, status: 1},
      },
      statusExpectedExit: {
        keys: {status: 1, expectedExitAt: 1},
      },
    },
  },
})
export class AccessSession extends AuditEntity {
  @property({
    type: 'number',
    id: true,
    generated: true,
  })
  id?: number;

  @belongsTo(
    () => Equipment,
    {},
    {
      required: true,
      mysql: {
        dataType: 'int',
      },
    },
  )
  equipmentId!: number;

  @property({
    type: 'number',
    required: true,
  })
  actorId!: number;

  @property({
    type: 'string',
    required: true,
    mysql: {
      dataType: 'varchar',
      dataLength: 20,
    },
    jsonSchema: {
      enum: Object.values(AccessType),
    },
  })
  accessType!: AccessType;

  @property({
    type: 'string',
    required: true,
    mysql: {
      dataType: 'varchar',
      dataLength: 20,
    },
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
    required: false,
  })
  exitAt?: Date | null;

  @property({
    type: 'date',
    required: true,
  })
  expectedExitAt!: Date;

  @property({
    type: 'string',
    required: false,
    mysql: {
      dataType: 'text',
    },
  })
  notes?: string;

  constructor(data?: Partial<AccessSession>) {
    super(data);
  }
}

export interface AccessSessionRelations {
  equipment?: Equipment;
}

export type AccessSessionWithRelations = AccessSession & AccessSessionRelations;
