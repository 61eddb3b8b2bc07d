import {authenticate} from '@loopback/authentication';
import {inject, service} from '@loopback/core';
import {get, getModelSchemaRef, param} from '@loopback/rest';
import {SecurityBindings} from '@loopback/security';
import {
  AccessSummaryResponse,
  ActorActivityRow,
  EquipmentReportRow,
} from '../rest';
import {Security} from '../security';
import {ActorProfile, MapperService, ReportService} from '../services';

const OAS_CONTROLLER_NAME = 'Report';

@authenticate({
  strategy: 'token',
  options: {required: [Security.Role.ADMINISTRATOR, Security.Role.IT]},
})
export class ReportController {
  constructor(
    @inject(SecurityBindings.USER) private actor: ActorProfile,
    @service(ReportService) private reportService: ReportService,
    @service(MapperService) private mapperService: MapperService,
  ) {}

  @get('/reports/summary', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'getAccessSummary',
    responses: {
      '200': {
        description: 'Access counters over a period',
        content: {
          'application/json': {
            schema: getModelSchemaRef(AccessSummaryResponse),
          },
        },
      },
    },
  })
  async getAccessSummary(
    @param.query.dateTime('startDate', {required: true}) startDate: Date,
    @param.query.dateTime('endDate', {required: true}) endDate: Date,
  ): Promise<AccessSummaryResponse> {
    const summary = await this.reportService.summary(
      startDate,
      endDate,
      this.actor,
    );
    return this.mapperService.toAccessSummaryResponse(summary);
  }

  @get('/reports/equipment', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'getEquipmentReport',
    responses: {
      '200': {
        description: 'Sessions entered in the period, oldest first',
        content: {
          'application/json': {
            schema: {
              type: 'array',
              items: getModelSchemaRef(EquipmentReportRow),
            },
          },
        },
      },
    },
  })
  async getEquipmentReport(
    @param.query.dateTime('startDate', {required: true}) startDate: Date,
    @param.query.dateTime('endDate', {required: true}) endDate: Date,
  ): Promise<EquipmentReportRow[]> {
    const entries = await this.reportService.equipmentReport(
      startDate,
      endDate,
      this.actor,
    );
    return entries.map(o => this.mapperService.toEquipmentReportRow(o));
  }

  @get('/reports/actor-activity', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'getActorActivityReport',
    responses: {
      '200': {
        description: 'Audited actions per actor in the period',
        content: {
          'application/json': {
            schema: {
              type: 'array',
              items: getModelSchemaRef(ActorActivityRow),
            },
          },
        },
      },
    },
  })
  async getActorActivityReport(
    @param.query.dateTime('startDate', {required: true}) startDate: Date,
    @param.query.dateTime('endDate', {required: true}) endDate: Date,
  ): Promise<ActorActivityRow[]> {
    const entries = await this.reportService.actorActivityReport(
      startDate,
      endDate,
      this.actor,
    );
    return entries.map(o => this.mapperService.toActorActivityRow(o));
  }
}
