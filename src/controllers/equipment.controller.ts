import {authenticate} from '@loopback/authentication';
import {inject, service} from '@loopback/core';
import {
  get,
  getModelSchemaRef,
  param,
  patch,
  post,
  requestBody,
  Response,
  RestBindings,
} from '@loopback/rest';
import {SecurityBindings} from '@loopback/security';
import {EquipmentCategory, EquipmentType} from '../models';
import {
  CreateEquipmentRequest,
  EquipmentDto,
  ListEquipmentResponse,
  SetEquipmentActiveRequest,
  UpdateEquipmentRequest,
} from '../rest';
import {Security} from '../security';
import {
  ActorProfile,
  EquipmentRegistryService,
  MapperService,
} from '../services';
import {SanitizationUtils} from '../utils';

const OAS_CONTROLLER_NAME = 'Equipment';

@authenticate({strategy: 'token'})
export class EquipmentController {
  constructor(
    @inject(RestBindings.Http.RESPONSE) private response: Response,
    @inject(SecurityBindings.USER) private actor: ActorProfile,
    @service(EquipmentRegistryService)
    private equipmentRegistryService: EquipmentRegistryService,
    @service(MapperService) private mapperService: MapperService,
  ) {}

  @post('/equipment', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'createEquipment',
    responses: {
      '201': {
        description: 'Registered equipment',
        content: {
          'application/json': {
            schema: getModelSchemaRef(EquipmentDto),
          },
        },
      },
    },
  })
  @authenticate({
    strategy: 'token',
    options: {required: [Security.Role.ADMINISTRATOR, Security.Role.IT]},
  })
  async createEquipment(
    @requestBody({
      content: {
        'application/json': {
          schema: getModelSchemaRef(CreateEquipmentRequest),
        },
      },
    })
    request: CreateEquipmentRequest,
  ): Promise<EquipmentDto> {
    const created = await this.equipmentRegistryService.create(
      request,
      this.actor,
    );
    this.response.status(201);
    return this.mapperService.toEquipmentDto(created);
  }

  @get('/equipment', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'listEquipment',
    responses: {
      '200': {
        description: 'Registered equipment, newest first',
        content: {
          'application/json': {
            schema: getModelSchemaRef(ListEquipmentResponse),
          },
        },
      },
    },
  })
  async listEquipment(
    @param.query.string('type', {required: false}) type?: string,
    @param.query.string('category', {required: false}) category?: string,
    @param.query.boolean('active', {required: false}) active?: boolean,
    @param.query.number('skip', {required: false}) skip?: number,
    @param.query.number('limit', {required: false}) limit?: number,
  ): Promise<ListEquipmentResponse> {
    const page = await this.equipmentRegistryService.list(
      {skip, limit},
      {
        type: type
          ? SanitizationUtils.sanitizeEnum(
              Object.values(EquipmentType),
              type,
              'equipment type',
            )
          : undefined,
        category: category
          ? SanitizationUtils.sanitizeEnum(
              Object.values(EquipmentCategory),
              category,
              'equipment category',
            )
          : undefined,
        active,
      },
    );
    return this.mapperService.toListEquipmentResponse(page);
  }

  @get('/equipment/{id}', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'getEquipment',
    responses: {
      '200': {
        description: 'Equipment',
        content: {
          'application/json': {
            schema: getModelSchemaRef(EquipmentDto),
          },
        },
      },
    },
  })
  async getEquipment(@param.path.number('id') id: number): Promise<EquipmentDto> {
    const equipment = await this.equipmentRegistryService.getOrNotFound(id);
    return this.mapperService.toEquipmentDto(equipment);
  }

  @get('/equipment/by-qr/{qrCode}', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'getEquipmentByQrCode',
    responses: {
      '200': {
        description: 'Equipment carrying the QR code',
        content: {
          'application/json': {
            schema: getModelSchemaRef(EquipmentDto),
          },
        },
      },
    },
  })
  async getEquipmentByQrCode(
    @param.path.string('qrCode') qrCode: string,
  ): Promise<EquipmentDto> {
    const equipment = await this.equipmentRegistryService.getByQrOrNotFound(
      SanitizationUtils.sanitizeIdentifier(qrCode),
    );
    return this.mapperService.toEquipmentDto(equipment);
  }

  @get('/equipment/by-serial/{serialNumber}', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'getEquipmentBySerialNumber',
    responses: {
      '200': {
        description: 'Equipment with the serial number',
        content: {
          'application/json': {
            schema: getModelSchemaRef(EquipmentDto),
          },
        },
      },
    },
  })
  async getEquipmentBySerialNumber(
    @param.path.string('serialNumber') serialNumber: string,
  ): Promise<EquipmentDto> {
    const equipment =
      await this.equipmentRegistryService.getBySerialOrNotFound(
        SanitizationUtils.sanitizeIdentifier(serialNumber),
      );
    return this.mapperService.toEquipmentDto(equipment);
  }

  @patch('/equipment/{id}', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'updateEquipment',
    responses: {
      '200': {
        description: 'Updated equipment',
        content: {
          'application/json': {
            schema: getModelSchemaRef(EquipmentDto),
          },
        },
      },
    },
  })
  @authenticate({
    strategy: 'token',
    options: {required: [Security.Role.ADMINISTRATOR, Security.Role.IT]},
  })
  async updateEquipment(
    @param.path.number('id') id: number,
    @requestBody({
      content: {
        'application/json': {
          schema: getModelSchemaRef(UpdateEquipmentRequest),
        },
      },
    })
    request: UpdateEquipmentRequest,
  ): Promise<EquipmentDto> {
    const updated = await this.equipmentRegistryService.update(
      id,
      request,
      this.actor,
    );
    return this.mapperService.toEquipmentDto(updated);
  }

  @patch('/equipment/{id}/active', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'setEquipmentActive',
    responses: {
      '200': {
        description: 'Updated equipment',
        content: {
          'application/json': {
            schema: getModelSchemaRef(EquipmentDto),
          },
        },
      },
    },
  })
  @authenticate({
    strategy: 'token',
    options: {required: [Security.Role.ADMINISTRATOR, Security.Role.IT]},
  })
  async setEquipmentActive(
    @param.path.number('id') id: number,
    @requestBody({
      content: {
        'application/json': {
          schema: getModelSchemaRef(SetEquipmentActiveRequest),
        },
      },
    })
    request: SetEquipmentActiveRequest,
  ): Promise<EquipmentDto> {
    const updated = await this.equipmentRegistryService.setActive(
      id,
      request.active,
      this.actor,
    );
    return this.mapperService.toEquipmentDto(updated);
  }
}
