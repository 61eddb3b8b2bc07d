import {model, property} from '@loopback/repository';
import {AuditEntity} from './proto/audit-entity.model';

export enum EquipmentType {
  FREQUENT = 'FREQUENT',
  NON_FREQUENT = 'NON_FREQUENT',
}

export enum EquipmentCategory {
  TECHNOLOGICAL = 'TECHNOLOGICAL',
  BIOMEDICAL = 'BIOMEDICAL',
}

@model({
  name: 'acc_equipment',
  settings: {
    indexes: {
      uniqueSerialNumber: {
        keys: {serialNumber: 1},
        options: {unique: true},
      },
      uniqueQrCode: {
        keys: {qrCode: 1},
        options: {unique: true},
      },
    },
  },
})
export class Equipment extends AuditEntity {
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
      dataLength: 255,
    },
  })
  name!: string;

  @property({
    type: 'string',
    required: false,
    mysql: {
      dataType: 'varchar',
      dataLength: 1024,
    },
  })
  description?: string | null;

  @property({
    type: 'string',
    required: true,
    mysql: {
      dataType: 'varchar',
      dataLength: 50,
    },
    jsonSchema: {
      enum: Object.values(EquipmentType),
    },
  })
  type!: EquipmentType;

  @property({
    type: 'string',
    required: true,
    mysql: {
      dataType: 'varchar',
      dataLength: 50,
    },
    jsonSchema: {
      enum: Object.values(EquipmentCategory),
    },
  })
  category!: EquipmentCategory;

  @property({
    type: 'string',
    required: false,
    mysql: {
      dataType: 'varchar',
      dataLength: 255,
    },
  })
  serialNumber?: string;

  @property({
    type: 'string',
    required: false,
    mysql: {
      dataType: 'varchar',
      dataLength: 255,
    },
  })
  qrCode?: string;

  @property({
    type: 'string',
    required: false,
    mysql: {
      dataType: 'varchar',
      dataLength: 1024,
    },
  })
  imageUrl?: string;

  @property({
    type: 'boolean',
    required: true,
  })
  active!: boolean;

  constructor(data?: Partial<Equipment>) {
    super(data);
  }
}

export interface EquipmentRelations {
  // describe navigational properties here
}

export type EquipmentWithRelations = Equipment & EquipmentRelations;
