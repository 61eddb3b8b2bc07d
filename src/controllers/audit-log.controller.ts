import {authenticate} from '@loopback/authentication';
import {service} from '@loopback/core';
import {get, getModelSchemaRef, param} from '@loopback/rest';
import {AuditAction} from '../models';
import {ListAuditLogsResponse} from '../rest';
import {Security} from '../security';
import {AuditService, MapperService} from '../services';
import {SanitizationUtils} from '../utils';

const OAS_CONTROLLER_NAME = 'AuditLog';

@authenticate({
  strategy: 'token',
  options: {required: [Security.Role.ADMINISTRATOR]},
})
export class AuditLogController {
  constructor(
    @service(AuditService) private auditService: AuditService,
    @service(MapperService) private mapperService: MapperService,
  ) {}

  @get('/audit-logs', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'listAuditLogs',
    responses: {
      '200': {
        description: 'Audit records, newest first',
        content: {
          'application/json': {
            schema: getModelSchemaRef(ListAuditLogsResponse),
          },
        },
      },
    },
  })
  async listAuditLogs(
    @param.query.string('action', {required: false}) action?: string,
    @param.query.number('actorId', {required: false}) actorId?: number,
    @param.query.dateTime('startDate', {required: false}) startDate?: Date,
    @param.query.dateTime('endDate', {required: false}) endDate?: Date,
    @param.query.number('skip', {required: false}) skip?: number,
    @param.query.number('limit', {required: false}) limit?: number,
  ): Promise<ListAuditLogsResponse> {
    const page = await this.auditService.list(
      {
        action: action
          ? SanitizationUtils.sanitizeEnum(
              Object.values(AuditAction),
              action,
              'audit action',
            )
          : undefined,
        actorId,
        startDate,
        endDate,
      },
      {skip, limit},
    );
    return this.mapperService.toListAuditLogsResponse(page);
  }
}
