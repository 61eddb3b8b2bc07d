import {inject, injectable} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {repository, Where} from '@loopback/repository';
import {Request, RestBindings} from '@loopback/rest';
import {ErrorBindings, LoggerBindings} from '../key';
import {
  AuditAction,
  AuditDetails,
  AuditEntityType,
  AuditLog,
  Page,
  Pageable,
} from '../models';
import {AuditLogRepository} from '../repositories';
import {SanitizationUtils} from '../utils';
import {ActorProfile} from './actor-profile.service';
import {ErrorService} from './error.service';

export interface AuditLogQuery {
  action?: AuditAction;
  actorId?: number;
  startDate?: Date;
  endDate?: Date;
}

@injectable()
export class AuditService {
  constructor(
    @inject(LoggerBindings.SERVICE_LOGGER) private logger: WinstonLogger,
    @repository(AuditLogRepository)
    private auditLogRepository: AuditLogRepository,
    @inject(ErrorBindings.ERROR_SERVICE) private errorService: ErrorService,
    @inject(RestBindings.Http.REQUEST, {optional: true})
    private req?: Request,
  ) {}

  /**
   * Appends an audit record. Never throws: a failed write is logged and
   * reported, and the caller carries on.
   */
  public async record(
    action: AuditAction,
    entityType: AuditEntityType,
    entityId?: number,
    actor?: ActorProfile,
    details?: AuditDetails,
  ): Promise<AuditLog | null> {
    try {
      return await this.auditLogRepository.create(
        new AuditLog({
          action,
          entityType,
          entityId,
          actorId: actor && actor.id > 0 ? actor.id : undefined,
          details: details ?? {},
          ipAddress: this.req?.ip,
          userAgent: this.req?.headers['user-agent'],
          createdAt: new Date(),
        }),
      );
    } catch (err) {
      this.logger.error(
        `failed to record audit event ${action} on ${entityType} ${entityId}`,
        err,
      );
      await this.errorService.reportError(
        `failed to record audit event ${action}`,
        {entityType, entityId, actorId: actor?.id},
      );
      return null;
    }
  }

  public async list(
    query: AuditLogQuery,
    pageable: Pageable,
  ): Promise<Page<AuditLog>> {
    const conditions: Where<AuditLog>[] = [];
    if (query.action) {
      conditions.push({action: query.action});
    }
    if (query.actorId !== undefined) {
      conditions.push({actorId: query.actorId});
    }
    if (query.startDate && query.endDate) {
      SanitizationUtils.sanitizeDateRange(query.startDate, query.endDate);
    }
    if (query.startDate) {
      conditions.push({createdAt: {gte: query.startDate}});
    }
    if (query.endDate) {
      conditions.push({createdAt: {lte: query.endDate}});
    }

    return this.auditLogRepository.findPage(
      {
        where: conditions.length ? {and: conditions} : {},
        order: ['createdAt DESC', 'id DESC'],
      },
      pageable,
    );
  }

  public async listAll(pageable: Pageable): Promise<Page<AuditLog>> {
    return this.list({}, pageable);
  }

  public async listByActor(
    actorId: number,
    pageable: Pageable,
  ): Promise<Page<AuditLog>> {
    return this.list({actorId}, pageable);
  }

  public async listByAction(
    action: AuditAction,
    pageable: Pageable,
  ): Promise<Page<AuditLog>> {
    return this.list({action}, pageable);
  }

  public async listByDateRange(
    startDate: Date,
    endDate: Date,
    pageable: Pageable,
  ): Promise<Page<AuditLog>> {
    SanitizationUtils.sanitizeDateRange(startDate, endDate);
    return this.list({startDate, endDate}, pageable);
  }
}
