import {Entity, model, property} from '@loopback/repository';

export enum AuditAction {
  ACCESS_ENTRY = 'ACCESS_ENTRY',
  ACCESS_EXIT = 'ACCESS_EXIT',
  ACCESS_FORCED_EXIT = 'ACCESS_FORCED_EXIT',
  ACCESS_EXPIRED = 'ACCESS_EXPIRED',
  ACCESS_BLOCKED = 'ACCESS_BLOCKED',
  EQUIPMENT_CREATED = 'EQUIPMENT_CREATED',
  EQUIPMENT_UPDATED = 'EQUIPMENT_UPDATED',
  REPORT_GENERATED = 'REPORT_GENERATED',
}

export enum AuditEntityType {
  ACCESS_SESSION = 'AccessSession',
  EQUIPMENT = 'Equipment',
  REPORT = 'Report',
}

export type AuditDetails = {[key: string]: unknown};

@model({
  name: 'acc_audit_log',
  settings: {
    indexes: {
      actionCreatedAt: {
        keys: {action: 1, createdAt: 1},
      },
    },
  },
})
export class AuditLog extends Entity {
  @property({
    type: 'number',
    id: true,
    generated: true,
  })
  id?: number;

  @property({
    type: 'string',
    required: true,
    mysql: {
      dataType: 'varchar',
      dataLength: 50,
    },
    jsonSchema: {
      enum: Object.values(AuditAction),
    },
  })
  action!: AuditAction;

  @property({
    type: 'string',
    required: true,
    mysql: {
      dataType: 'varchar',
      dataLength: 100,
    },
  })
  entityType!: string;

  @property({
    type: 'number',
    required: false,
  })
  entityId?: number;

  @property({
    type: 'number',
    required: false,
  })
  actorId?: number;

  @property({
    type: 'object',
    required: false,
    mysql: {
      dataType: 'json',
    },
  })
  details?: AuditDetails;

  @property({
    type: 'string',
    required: false,
    mysql: {
      dataType: 'varchar',
      dataLength: 100,
    },
  })
  ipAddress?: string;

  @property({
    type: 'string',
    required: false,
    mysql: {
      dataType: 'varchar',
      dataLength: 512,
    },
  })
  userAgent?: string;

  @property({
    type: 'date',
    required: true,
  })
  createdAt!: Date;

  constructor(data?: Partial<AuditLog>) {
    super(data);
  }
}

export interface AuditLogRelations {
  // describe navigational properties here
}

export type AuditLogWithRelations = AuditLog & AuditLogRelations;
