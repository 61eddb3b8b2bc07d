import {inject, injectable, service} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {Condition, repository} from '@loopback/repository';
import {HttpErrors} from '@loopback/rest';
import {v4 as uuidv4} from 'uuid';
import {LoggerBindings} from '../key';
import {
  AuditAction,
  AuditEntityType,
  Equipment,
  EquipmentCategory,
  EquipmentType,
  Page,
  Pageable,
} from '../models';
import {EquipmentRepository} from '../repositories';
import {ObjectUtils, SanitizationUtils, StringUtils} from '../utils';
import {AccessErrors} from './access-errors';
import {ActorProfile} from './actor-profile.service';
import {AuditService} from './audit.service';

export enum EquipmentResolutionStrategy {
  QR_CODE = 'QR_CODE',
  SERIAL_NUMBER = 'SERIAL_NUMBER',
}

/**
 * Identifiers presented at the gate are matched against QR codes first,
 * then against serial numbers.
 */
export const EQUIPMENT_RESOLUTION_ORDER: readonly EquipmentResolutionStrategy[] =
  [EquipmentResolutionStrategy.QR_CODE, EquipmentResolutionStrategy.SERIAL_NUMBER];

export const GENERATED_QR_CODE_PREFIX = 'EQ-';

export interface EquipmentCreation {
  name: string;
  description?: string;
  type: EquipmentType;
  category: EquipmentCategory;
  serialNumber?: string;
  qrCode?: string;
  imageUrl?: string;
}

/**
 * Absent fields are left unchanged. An empty description clears it.
 */
export interface EquipmentUpdate {
  name?: string;
  description?: string;
}

export interface EquipmentQuery {
  type?: EquipmentType;
  category?: EquipmentCategory;
  active?: boolean;
}

@injectable()
export class EquipmentRegistryService {
  constructor(
    @inject(LoggerBindings.SERVICE_LOGGER) private logger: WinstonLogger,
    @repository(EquipmentRepository)
    private equipmentRepository: EquipmentRepository,
    @service(AuditService)
    private auditService: AuditService,
  ) {}

  public async findByQr(code: string): Promise<Equipment | null> {
    const trimmed = code?.trim();
    if (!trimmed) {
      return null;
    }
    return this.equipmentRepository.findByQrCode(trimmed);
  }

  public async findBySerial(serial: string): Promise<Equipment | null> {
    const trimmed = serial?.trim();
    if (!trimmed) {
      return null;
    }
    return this.equipmentRepository.findBySerialNumber(trimmed);
  }

  public async get(id: number): Promise<Equipment | null> {
    return this.equipmentRepository.findOne({where: {id}});
  }

  public async findByIds(ids: number[]): Promise<Equipment[]> {
    const unique = [...new Set(ids)];
    if (!unique.length) {
      return [];
    }
    return this.equipmentRepository.find({where: {id: {inq: unique}}});
  }

  public async getOrNotFound(id: number): Promise<Equipment> {
    const equipment = await this.get(id);
    if (!equipment) {
      throw AccessErrors.notFound(`Equipment ${id} not found`);
    }
    return equipment;
  }

  public async getByQrOrNotFound(code: string): Promise<Equipment> {
    const equipment = await this.findByQr(code);
    if (!equipment) {
      throw AccessErrors.notFound(`Equipment not found for QR code: ${code}`);
    }
    return equipment;
  }

  public async getBySerialOrNotFound(serial: string): Promise<Equipment> {
    const equipment = await this.findBySerial(serial);
    if (!equipment) {
      throw AccessErrors.notFound(
        `Equipment not found for serial number: ${serial}`,
      );
    }
    return equipment;
  }

  public async resolve(identifier: string): Promise<Equipment | null> {
    for (const strategy of EQUIPMENT_RESOLUTION_ORDER) {
      const match = await this.resolveWith(strategy, identifier);
      if (match) {
        this.logger.debug(
          `resolved equipment ${match.id} from identifier ${identifier} by ${strategy}`,
        );
        return match;
      }
    }
    return null;
  }

  public async resolveOrNotFound(identifier: string): Promise<Equipment> {
    const sanitized = SanitizationUtils.sanitizeIdentifier(identifier);
    const equipment = await this.resolve(sanitized);
    if (!equipment) {
      throw AccessErrors.notFound(`Equipment not found: ${sanitized}`);
    }
    return equipment;
  }

  public async create(
    request: EquipmentCreation,
    actor: ActorProfile,
  ): Promise<Equipment> {
    const name = request.name?.trim();
    if (!name) {
      throw new HttpErrors.BadRequest('Equipment name is required');
    }
    const type = SanitizationUtils.sanitizeEnum(
      Object.values(EquipmentType),
      request.type,
      'equipment type',
    );
    const category = SanitizationUtils.sanitizeEnum(
      Object.values(EquipmentCategory),
      request.category,
      'equipment category',
    );
    const serialNumber = SanitizationUtils.sanitizeOptionalCode(
      request.serialNumber,
    );
    let qrCode = SanitizationUtils.sanitizeOptionalCode(request.qrCode);
    const imageUrl = request.imageUrl?.trim();

    if (qrCode && type !== EquipmentType.FREQUENT) {
      throw new HttpErrors.BadRequest(
        'A QR code can only be assigned to FREQUENT equipment',
      );
    }
    if (category === EquipmentCategory.BIOMEDICAL && StringUtils.isBlank(imageUrl)) {
      throw new HttpErrors.BadRequest('Biomedical equipment requires an image');
    }
    if (type === EquipmentType.FREQUENT && !qrCode) {
      qrCode = EquipmentRegistryService.generateQrCode();
    }

    if (serialNumber && (await this.findBySerial(serialNumber))) {
      throw AccessErrors.conflict(
        `Serial number already registered: ${serialNumber}`,
      );
    }
    if (qrCode && (await this.findByQr(qrCode))) {
      throw AccessErrors.conflict(`QR code already registered: ${qrCode}`);
    }

    let created: Equipment;
    try {
      created = await this.equipmentRepository.create(
        new Equipment({
          name,
          description: request.description?.trim() || undefined,
          type,
          category,
          serialNumber,
          qrCode,
          imageUrl: imageUrl || undefined,
          active: true,
          version: 1,
          createdBy: actor.username,
          createdAt: new Date(),
        }),
      );
    } catch (err) {
      if (AccessErrors.isDuplicateEntry(err)) {
        throw AccessErrors.conflict(
          'Serial number or QR code already registered',
        );
      }
      throw err;
    }

    this.logger.info(
      `equipment ${created.id} registered by ${actor.username} (${type}, ${category})`,
    );

    await this.auditService.record(
      AuditAction.EQUIPMENT_CREATED,
      AuditEntityType.EQUIPMENT,
      created.id,
      actor,
      {
        name,
        type,
        category,
        serialNumber: serialNumber ?? null,
        qrCode: qrCode ?? null,
      },
    );

    return created;
  }

  public async update(
    id: number,
    request: EquipmentUpdate,
    actor: ActorProfile,
  ): Promise<Equipment> {
    const equipment = await this.getOrNotFound(id);

    const changes: Partial<Pick<Equipment, 'name' | 'description'>> = {};
    if (ObjectUtils.isDefined(request.name)) {
      const name = request.name.trim();
      if (!name) {
        throw new HttpErrors.BadRequest('Equipment name cannot be blank');
      }
      if (name !== equipment.name) {
        changes.name = name;
      }
    }
    if (ObjectUtils.isDefined(request.description)) {
      const description = request.description.trim() || null;
      if (description !== (equipment.description ?? null)) {
        changes.description = description;
      }
    }

    if (!Object.keys(changes).length) {
      return equipment;
    }

    const updated = await this.equipmentRepository.compareAndSet(
      equipment,
      changes,
      actor.username,
    );
    if (!updated) {
      throw AccessErrors.concurrentModification('Equipment', id);
    }

    this.logger.info(
      `equipment ${id} updated by ${actor.username}: ${Object.keys(changes).join(', ')}`,
    );

    await this.auditService.record(
      AuditAction.EQUIPMENT_UPDATED,
      AuditEntityType.EQUIPMENT,
      id,
      actor,
      {...changes},
    );

    return updated;
  }

  public async setActive(
    id: number,
    active: boolean,
    actor: ActorProfile,
  ): Promise<Equipment> {
    const equipment = await this.getOrNotFound(id);
    if (equipment.active === active) {
      return equipment;
    }

    const updated = await this.equipmentRepository.compareAndSet(
      equipment,
      {active},
      actor.username,
    );
    if (!updated) {
      throw AccessErrors.concurrentModification('Equipment', id);
    }

    await this.auditService.record(
      AuditAction.EQUIPMENT_UPDATED,
      AuditEntityType.EQUIPMENT,
      id,
      actor,
      {active},
    );

    return updated;
  }

  public async list(
    pageable: Pageable,
    query: EquipmentQuery = {},
  ): Promise<Page<Equipment>> {
    const where: Condition<Equipment> = {};
    if (ObjectUtils.isDefined(query.type)) {
      where.type = query.type;
    }
    if (ObjectUtils.isDefined(query.category)) {
      where.category = query.category;
    }
    if (ObjectUtils.isDefined(query.active)) {
      where.active = query.active;
    }

    return this.equipmentRepository.findPage(
      {
        where,
        order: ['createdAt DESC', 'id DESC'],
      },
      pageable,
    );
  }

  public static generateQrCode(): string {
    return (
      GENERATED_QR_CODE_PREFIX +
      uuidv4().replace(/-/g, '').substring(0, 12).toUpperCase()
    );
  }

  private async resolveWith(
    strategy: EquipmentResolutionStrategy,
    identifier: string,
  ): Promise<Equipment | null> {
    switch (strategy) {
      case EquipmentResolutionStrategy.QR_CODE:
        return this.findByQr(identifier);
      case EquipmentResolutionStrategy.SERIAL_NUMBER:
        return this.findBySerial(identifier);
    }
  }
}
