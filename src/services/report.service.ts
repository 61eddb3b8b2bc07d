import {inject, injectable, service} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {repository} from '@loopback/repository';
import {LoggerBindings} from '../key';
import {
  AccessSessionStatus,
  AuditAction,
  AuditEntityType,
  Equipment,
} from '../models';
import {
  AccessSessionRepository,
  AuditLogRepository,
  EquipmentRepository,
} from '../repositories';
import {ObjectUtils, SanitizationUtils} from '../utils';
import {ActorProfile} from './actor-profile.service';
import {AuditService} from './audit.service';
import {SessionStateMachine} from './session-state-machine';

const DAY_MILLIS = 24 * 60 * 60 * 1000;

export enum ReportKind {
  SUMMARY = 'SUMMARY',
  EQUIPMENT = 'EQUIPMENT',
  ACTOR_ACTIVITY = 'ACTOR_ACTIVITY',
}

export interface AccessSummary {
  totalEntries: number;
  totalExits: number;
  currentlyInside: number;
  expiredSessions: number;
  totalEquipment: number;
  periodStart: Date;
  periodEnd: Date;
}

export interface EquipmentReportEntry {
  sessionId: number;
  equipmentId: number;
  equipmentName?: string;
  qrCode?: string;
  serialNumber?: string;
  actorId: number;
  entryAt: Date;
  exitAt?: Date;
  expectedExitAt: Date;
  status: AccessSessionStatus;
  daysInside: number;
  isExpired: boolean;
}

export interface ActorActivityEntry {
  actorId: number;
  totalActions: number;
  lastActionAt: Date;
}

@injectable()
export class ReportService {
  constructor(
    @inject(LoggerBindings.SERVICE_LOGGER) private logger: WinstonLogger,
    @repository(AccessSessionRepository)
    private accessSessionRepository: AccessSessionRepository,
    @repository(EquipmentRepository)
    private equipmentRepository: EquipmentRepository,
    @repository(AuditLogRepository)
    private auditLogRepository: AuditLogRepository,
    @service(AuditService)
    private auditService: AuditService,
  ) {}

  /**
   * Counts over the period, both ends inclusive. `currentlyInside` ignores
   * the period.
   */
  public async summary(
    start: Date,
    end: Date,
    actor: ActorProfile,
  ): Promise<AccessSummary> {
    SanitizationUtils.sanitizeDateRange(start, end);

    const [entries, exits, inside, expired, equipment] = await Promise.all([
      this.accessSessionRepository.count({
        entryAt: {between: [start, end]},
      }),
      this.accessSessionRepository.count({
        and: [
          {status: AccessSessionStatus.COMPLETED},
          {exitAt: {between: [start, end]}},
        ],
      }),
      this.accessSessionRepository.count({
        status: AccessSessionStatus.ACTIVE,
      }),
      this.accessSessionRepository.count({
        and: [
          {status: AccessSessionStatus.EXPIRED},
          {entryAt: {between: [start, end]}},
        ],
      }),
      this.equipmentRepository.count(),
    ]);

    const output: AccessSummary = {
      totalEntries: entries.count,
      totalExits: exits.count,
      currentlyInside: inside.count,
      expiredSessions: expired.count,
      totalEquipment: equipment.count,
      periodStart: start,
      periodEnd: end,
    };

    this.logger.debug('generated access summary', output);
    await this.recordGeneration(ReportKind.SUMMARY, start, end, actor);

    return output;
  }

  /**
   * One row per session entered in the period, oldest entry first.
   * `daysInside` runs to the exit, or to now for sessions still open.
   */
  public async equipmentReport(
    start: Date,
    end: Date,
    actor: ActorProfile,
  ): Promise<EquipmentReportEntry[]> {
    SanitizationUtils.sanitizeDateRange(start, end);

    const sessions = await this.accessSessionRepository.find({
      where: {entryAt: {between: [start, end]}},
      order: ['entryAt ASC', 'id ASC'],
    });

    const equipmentIds = [...new Set(sessions.map(o => o.equipmentId))];
    const equipment = equipmentIds.length
      ? await this.equipmentRepository.find({
          where: {id: {inq: equipmentIds}},
        })
      : [];
    const equipmentById = new Map<number | undefined, Equipment>(
      equipment.map(o => [o.id, o]),
    );

    const now = new Date();
    const rows = sessions.map(session => {
      const item = equipmentById.get(session.equipmentId);
      const until = session.exitAt ?? now;
      return {
        sessionId: ObjectUtils.require(session, 'id'),
        equipmentId: session.equipmentId,
        equipmentName: item?.name,
        qrCode: item?.qrCode,
        serialNumber: item?.serialNumber,
        actorId: session.actorId,
        entryAt: session.entryAt,
        exitAt: session.exitAt ?? undefined,
        expectedExitAt: session.expectedExitAt,
        status: session.status,
        daysInside: Math.max(
          0,
          Math.floor((until.getTime() - session.entryAt.getTime()) / DAY_MILLIS),
        ),
        isExpired:
          session.status === AccessSessionStatus.EXPIRED ||
          SessionStateMachine.isOverdue(session, now),
      };
    });

    this.logger.debug(`generated equipment report with ${rows.length} rows`);
    await this.recordGeneration(ReportKind.EQUIPMENT, start, end, actor);

    return rows;
  }

  /**
   * Audited actions per actor in the period, busiest actor first. System
   * actions carry no actor and are left out.
   */
  public async actorActivityReport(
    start: Date,
    end: Date,
    actor: ActorProfile,
  ): Promise<ActorActivityEntry[]> {
    SanitizationUtils.sanitizeDateRange(start, end);

    const records = await this.auditLogRepository.find({
      where: {createdAt: {between: [start, end]}},
      fields: {actorId: true, createdAt: true},
    });

    const byActor = new Map<number, ActorActivityEntry>();
    for (const record of records) {
      if (!ObjectUtils.isDefined(record.actorId)) {
        continue;
      }
      const row = byActor.get(record.actorId);
      if (!row) {
        byActor.set(record.actorId, {
          actorId: record.actorId,
          totalActions: 1,
          lastActionAt: record.createdAt,
        });
        continue;
      }
      row.totalActions++;
      if (record.createdAt.getTime() > row.lastActionAt.getTime()) {
        row.lastActionAt = record.createdAt;
      }
    }

    const rows = [...byActor.values()].sort(
      (a, b) => b.totalActions - a.totalActions || a.actorId - b.actorId,
    );

    this.logger.debug(`generated activity report for ${rows.length} actors`);
    await this.recordGeneration(ReportKind.ACTOR_ACTIVITY, start, end, actor);

    return rows;
  }

  private async recordGeneration(
    kind: ReportKind,
    start: Date,
    end: Date,
    actor: ActorProfile,
  ): Promise<void> {
    await this.auditService.record(
      AuditAction.REPORT_GENERATED,
      AuditEntityType.REPORT,
      undefined,
      actor,
      {
        report: kind,
        periodStart: start.toISOString(),
        periodEnd: end.toISOString(),
      },
    );
  }
}
