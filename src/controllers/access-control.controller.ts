import {authenticate} from '@loopback/authentication';
import {inject, service} from '@loopback/core';
import {
  get,
  getModelSchemaRef,
  param,
  post,
  requestBody,
  Response,
  RestBindings,
} from '@loopback/rest';
import {SecurityBindings} from '@loopback/security';
import {AccessSession} from '../models';
import {
  AccessSessionDto,
  ActiveEquipmentDto,
  ForceExitRequest,
  ListSessionsResponse,
  RegisterAccessRequest,
} from '../rest';
import {Security} from '../security';
import {
  AccessSessionService,
  ActorProfile,
  EquipmentRegistryService,
  MapperService,
} from '../services';

const OAS_CONTROLLER_NAME = 'AccessControl';

const PAGE_PARAMS = {
  skip: {
    required: false,
    schema: {
      type: 'integer',
      format: 'int32',
    },
  },
  limit: {
    required: false,
    schema: {
      type: 'integer',
      format: 'int32',
    },
  },
} as const;

@authenticate({strategy: 'token'})
export class AccessControlController {
  constructor(
    @inject(RestBindings.Http.RESPONSE) private response: Response,
    @inject(SecurityBindings.USER) private actor: ActorProfile,
    @service(AccessSessionService)
    private accessSessionService: AccessSessionService,
    @service(EquipmentRegistryService)
    private equipmentRegistryService: EquipmentRegistryService,
    @service(MapperService) private mapperService: MapperService,
  ) {}

  @post('/access/entry', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'registerEntry',
    responses: {
      '201': {
        description: 'Access session opened',
        content: {
          'application/json': {
            schema: getModelSchemaRef(AccessSessionDto),
          },
        },
      },
    },
  })
  async registerEntry(
    @requestBody({
      content: {
        'application/json': {
          schema: getModelSchemaRef(RegisterAccessRequest),
        },
      },
    })
    request: RegisterAccessRequest,
  ): Promise<AccessSessionDto> {
    const session = await this.accessSessionService.registerEntry(
      request.equipmentIdentifier,
      this.actor,
      request.notes,
    );
    this.response.status(201);
    return this.mapperService.toAccessSessionDto(session);
  }

  @post('/access/exit', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'registerExit',
    responses: {
      '200': {
        description: 'Access session completed',
        content: {
          'application/json': {
            schema: getModelSchemaRef(AccessSessionDto),
          },
        },
      },
    },
  })
  async registerExit(
    @requestBody({
      content: {
        'application/json': {
          schema: getModelSchemaRef(RegisterAccessRequest),
        },
      },
    })
    request: RegisterAccessRequest,
  ): Promise<AccessSessionDto> {
    const session = await this.accessSessionService.registerExit(
      request.equipmentIdentifier,
      this.actor,
      request.notes,
    );
    return this.mapperService.toAccessSessionDto(session);
  }

  @get('/access/active', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'listActive',
    responses: {
      '200': {
        description: 'Equipment currently inside',
        content: {
          'application/json': {
            schema: {
              type: 'array',
              items: getModelSchemaRef(ActiveEquipmentDto),
            },
          },
        },
      },
    },
  })
  async listActive(): Promise<ActiveEquipmentDto[]> {
    const sessions = await this.accessSessionService.listActive();
    return this.toActiveEquipmentDtos(sessions);
  }

  @get('/access/expired', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'listExpired',
    description:
      'Lists overdue sessions, marking the ones still ACTIVE as EXPIRED.',
    responses: {
      '200': {
        description: 'Equipment that overstayed',
        content: {
          'application/json': {
            schema: {
              type: 'array',
              items: getModelSchemaRef(ActiveEquipmentDto),
            },
          },
        },
      },
    },
  })
  async listExpired(): Promise<ActiveEquipmentDto[]> {
    const sessions = await this.accessSessionService.listExpired();
    return this.toActiveEquipmentDtos(sessions);
  }

  @get('/access/sessions/{id}', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'getSession',
    responses: {
      '200': {
        description: 'Access session',
        content: {
          'application/json': {
            schema: getModelSchemaRef(AccessSessionDto),
          },
        },
      },
    },
  })
  async getSession(
    @param.path.number('id') id: number,
  ): Promise<AccessSessionDto> {
    const session = await this.accessSessionService.getSession(id);
    return this.mapperService.toAccessSessionDto(session);
  }

  @post('/access/sessions/{id}/force-exit', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'forceExit',
    responses: {
      '200': {
        description: 'Access session closed by an administrator',
        content: {
          'application/json': {
            schema: getModelSchemaRef(AccessSessionDto),
          },
        },
      },
    },
  })
  @authenticate({
    strategy: 'token',
    options: {required: [Security.Role.ADMINISTRATOR]},
  })
  async forceExit(
    @param.path.number('id') id: number,
    @requestBody({
      content: {
        'application/json': {
          schema: getModelSchemaRef(ForceExitRequest),
        },
      },
    })
    request: ForceExitRequest,
  ): Promise<AccessSessionDto> {
    const session = await this.accessSessionService.forceExit(
      id,
      this.actor,
      request.reason,
    );
    return this.mapperService.toAccessSessionDto(session);
  }

  @get('/access/equipment/{equipmentId}/history', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'equipmentHistory',
    responses: {
      '200': {
        description: 'Sessions of an equipment item, newest first',
        content: {
          'application/json': {
            schema: getModelSchemaRef(ListSessionsResponse),
          },
        },
      },
    },
  })
  async equipmentHistory(
    @param.path.number('equipmentId') equipmentId: number,
    @param.query.number('skip', PAGE_PARAMS.skip) skip?: number,
    @param.query.number('limit', PAGE_PARAMS.limit) limit?: number,
  ): Promise<ListSessionsResponse> {
    const page = await this.accessSessionService.equipmentHistory(
      equipmentId,
      {skip, limit},
    );
    return this.mapperService.toListSessionsResponse(page);
  }

  @get('/access/actor/{actorId}/history', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'actorHistory',
    responses: {
      '200': {
        description: 'Sessions opened by an actor, newest first',
        content: {
          'application/json': {
            schema: getModelSchemaRef(ListSessionsResponse),
          },
        },
      },
    },
  })
  async actorHistory(
    @param.path.number('actorId') actorId: number,
    @param.query.number('skip', PAGE_PARAMS.skip) skip?: number,
    @param.query.number('limit', PAGE_PARAMS.limit) limit?: number,
  ): Promise<ListSessionsResponse> {
    const page = await this.accessSessionService.actorHistory(actorId, {
      skip,
      limit,
    });
    return this.mapperService.toListSessionsResponse(page);
  }

  @get('/access/date-range', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'dateRangeHistory',
    responses: {
      '200': {
        description: 'Sessions created in the period, newest first',
        content: {
          'application/json': {
            schema: getModelSchemaRef(ListSessionsResponse),
          },
        },
      },
    },
  })
  async dateRangeHistory(
    @param.query.dateTime('startDate', {required: true}) startDate: Date,
    @param.query.dateTime('endDate', {required: true}) endDate: Date,
    @param.query.number('skip', PAGE_PARAMS.skip) skip?: number,
    @param.query.number('limit', PAGE_PARAMS.limit) limit?: number,
  ): Promise<ListSessionsResponse> {
    const page = await this.accessSessionService.dateRangeHistory(
      startDate,
      endDate,
      {skip, limit},
    );
    return this.mapperService.toListSessionsResponse(page);
  }

  private async toActiveEquipmentDtos(
    sessions: AccessSession[],
  ): Promise<ActiveEquipmentDto[]> {
    const equipment = await this.equipmentRegistryService.findByIds(
      sessions.map(o => o.equipmentId),
    );
    const byId = new Map(equipment.map(o => [o.id, o]));
    const now = new Date();

    return sessions.map(o =>
      this.mapperService.toActiveEquipmentDto(o, byId.get(o.equipmentId), now),
    );
  }
}
