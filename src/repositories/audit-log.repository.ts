import {inject} from '@loopback/core';
import {DbDataSource} from '../datasources';
import {AuditLog, AuditLogRelations} from '../models';
import {PaginationRepository} from './proto';

export class AuditLogRepository extends PaginationRepository<
  AuditLog,
  typeof AuditLog.prototype.id,
  AuditLogRelations
> {
  constructor(@inject('datasources.Db') dataSource: DbDataSource) {
    super(AuditLog, dataSource);
  }
}
