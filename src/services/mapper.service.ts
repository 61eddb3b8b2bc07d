import {injectable} from '@loopback/core';
import {AccessSession, AccessSessionStatus, AuditLog, Equipment, Page} from '../models';
import {AuditEntity} from '../models/proto';
import {
  AccessSessionDto,
  AccessSummaryResponse,
  ActiveEquipmentDto,
  ActorActivityRow,
  AuditFieldsDto,
  AuditLogDto,
  EquipmentDto,
  EquipmentReportRow,
  ListAuditLogsResponse,
  ListEquipmentResponse,
  ListSessionsResponse,
} from '../rest';
import {ObjectUtils} from '../utils';
import {
  AccessSummary,
  ActorActivityEntry,
  EquipmentReportEntry,
} from './report.service';
import {SessionStateMachine} from './session-state-machine';

const DAY_MILLIS = 24 * 60 * 60 * 1000;

@injectable()
export class MapperService {
  constructor() {
    // NOP
  }

  public toAccessSessionDto(entity: AccessSession): AccessSessionDto {
    return new AccessSessionDto({
      ...entity,
      id: ObjectUtils.require(entity, 'id'),
      exitAt: entity.exitAt ?? undefined,
      audit: this.toAuditFieldsDto(entity),
    });
  }

  /**
   * `daysInside` counts whole days elapsed between entry and `at`.
   */
  public toActiveEquipmentDto(
    session: AccessSession,
    equipment: Equipment | undefined,
    at: Date,
  ): ActiveEquipmentDto {
    return new ActiveEquipmentDto({
      sessionId: ObjectUtils.require(session, 'id'),
      equipmentId: session.equipmentId,
      equipmentName: equipment?.name,
      qrCode: equipment?.qrCode,
      serialNumber: equipment?.serialNumber,
      actorId: session.actorId,
      entryAt: session.entryAt,
      expectedExitAt: session.expectedExitAt,
      daysInside: Math.max(
        0,
        Math.floor((at.getTime() - session.entryAt.getTime()) / DAY_MILLIS),
      ),
      isExpired:
        session.status === AccessSessionStatus.EXPIRED ||
        SessionStateMachine.isOverdue(session, at),
      status: session.status,
    });
  }

  public toEquipmentDto(entity: Equipment): EquipmentDto {
    return new EquipmentDto({
      ...entity,
      id: ObjectUtils.require(entity, 'id'),
      description: entity.description ?? undefined,
      audit: this.toAuditFieldsDto(entity),
    });
  }

  public toAuditLogDto(entity: AuditLog): AuditLogDto {
    return new AuditLogDto({
      ...entity,
      id: ObjectUtils.require(entity, 'id'),
    });
  }

  public toAuditFieldsDto(entity: AuditEntity): AuditFieldsDto {
    return new AuditFieldsDto({
      version: entity.version,
      createdBy: entity.createdBy,
      createdAt: entity.createdAt,
      modifiedBy: entity.modifiedBy,
      modifiedAt: entity.modifiedAt,
    });
  }

  public toListSessionsResponse(page: Page<AccessSession>): ListSessionsResponse {
    return new ListSessionsResponse({
      ...this.toPageFields(page),
      content: page.content.map(o => this.toAccessSessionDto(o)),
    });
  }

  public toListEquipmentResponse(page: Page<Equipment>): ListEquipmentResponse {
    return new ListEquipmentResponse({
      ...this.toPageFields(page),
      content: page.content.map(o => this.toEquipmentDto(o)),
    });
  }

  public toListAuditLogsResponse(page: Page<AuditLog>): ListAuditLogsResponse {
    return new ListAuditLogsResponse({
      ...this.toPageFields(page),
      content: page.content.map(o => this.toAuditLogDto(o)),
    });
  }

  public toAccessSummaryResponse(summary: AccessSummary): AccessSummaryResponse {
    return new AccessSummaryResponse({...summary});
  }

  public toEquipmentReportRow(entry: EquipmentReportEntry): EquipmentReportRow {
    return new EquipmentReportRow({...entry});
  }

  public toActorActivityRow(entry: ActorActivityEntry): ActorActivityRow {
    return new ActorActivityRow({...entry});
  }

  private toPageFields<T>(page: Page<T>) {
    return {
      numberOfElements: page.numberOfElements,
      totalElements: page.totalElements,
      skip: page.skip,
      limit: page.limit,
      hasNext: page.hasNext,
    };
  }
}
