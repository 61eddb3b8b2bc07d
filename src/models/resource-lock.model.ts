import {Entity, model, property} from '@loopback/repository';

/**
 * A leased lock on a named resource. The unique index on `resourceCode`
 * keeps two processes from holding the same lock.
 */
@model({
  name: 'acc_resource_lock',
  settings: {
    indexes: {
      uniqueResourceCode: {
        keys: {resourceCode: 1},
        options: {unique: true},
      },
    },
  },
})
export class ResourceLock extends Entity {
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
  resourceCode!: string;

  @property({
    type: 'string',
    required: true,
    mysql: {
      dataType: 'varchar',
      dataLength: 255,
    },
  })
  ownerCode!: string;

  @property({
    type: 'date',
    required: true,
  })
  expiresAt!: Date;

  constructor(data?: Partial<ResourceLock>) {
    super(data);
  }
}

export interface ResourceLockRelations {
  // describe navigational properties here
}

export type ResourceLockWithRelations = ResourceLock & ResourceLockRelations;
