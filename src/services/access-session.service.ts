import {inject, injectable, service} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {
  DataObject,
  IsolationLevel,
  juggler,
  repository,
} from '@loopback/repository';
import {HttpErrors} from '@loopback/rest';
import {ConfigurationBindings, LoggerBindings} from '../key';
import {
  AccessSession,
  AccessSessionStatus,
  AccessType,
  AuditAction,
  AuditEntityType,
  Page,
  Pageable,
} from '../models';
import {AccessSessionRepository} from '../repositories';
import {Security} from '../security/security-constants';
import {
  AppCustomAccessConfig,
  ObjectUtils,
  SanitizationUtils,
  StringUtils,
} from '../utils';
import {AccessErrors} from './access-errors';
import {ActorProfile, SystemActor} from './actor-profile.service';
import {AuditService} from './audit.service';
import {EquipmentRegistryService} from './equipment-registry.service';
import {LockService} from './lock.service';
import {SessionOperation, SessionStateMachine} from './session-state-machine';
import {TransactionService} from './transaction-manager.service';

const DAY_MILLIS = 24 * 60 * 60 * 1000;

/**
 * Stay policy applied when an entry is registered. Defaults to the
 * configured `access.maxStayDays`.
 */
export interface AccessPolicy {
  maxStayDays: number;
}

/**
 * Lifecycle of equipment access sessions: entry, exit, expiration and
 * forced exit.
 *
 * Entries are serialized per equipment through a resource lock and a
 * SERIALIZABLE transaction. Every later change is a conditional update on
 * the version that was read, so of two concurrent writers only one wins and
 * the other gets a Conflict. Audit records are written after commit.
 */
@injectable()
export class AccessSessionService {
  constructor(
    @inject(LoggerBindings.SERVICE_LOGGER) private logger: WinstonLogger,
    @inject(ConfigurationBindings.ACCESS_CONFIG)
    private accessConfig: AppCustomAccessConfig,
    @repository(AccessSessionRepository)
    private accessSessionRepository: AccessSessionRepository,
    @service(EquipmentRegistryService)
    private equipmentRegistryService: EquipmentRegistryService,
    @service(AuditService)
    private auditService: AuditService,
    @service(LockService)
    private lockService: LockService,
    @service(TransactionService)
    private transactionService: TransactionService,
  ) {}

  public async registerEntry(
    identifier: string,
    actor: ActorProfile,
    notes?: string,
    policy?: AccessPolicy,
  ): Promise<AccessSession> {
    const equipment =
      await this.equipmentRegistryService.resolveOrNotFound(identifier);
    const equipmentId = ObjectUtils.require(equipment, 'id');

    if (!equipment.active) {
      throw AccessErrors.invalidState(`Equipment ${equipmentId} is not active`);
    }

    const maxStayDays = this.resolveMaxStayDays(policy);
    const sanitizedNotes = SanitizationUtils.sanitizeNote(notes);

    const created = await this.lockService.withEquipmentSessionLock(
      equipmentId,
      async () =>
        this.transactionService.inTransaction(async transaction => {
          const existing =
            await this.accessSessionRepository.findActiveForEquipment(
              equipmentId,
              {transaction},
            );
          if (existing) {
            throw AccessErrors.conflict(
              `Equipment already inside since ${existing.entryAt.toISOString()}`,
            );
          }

          const now = new Date();
          return this.accessSessionRepository.create(
            new AccessSession({
              equipmentId,
              actorId: actor.id,
              accessType: AccessType.ENTRY,
              status: AccessSessionStatus.ACTIVE,
              entryAt: now,
              exitAt: null,
              expectedExitAt: new Date(now.getTime() + maxStayDays * DAY_MILLIS),
              notes: sanitizedNotes,
              version: 1,
              createdBy: actor.username,
              createdAt: now,
            }),
            {transaction},
          );
        }, IsolationLevel.SERIALIZABLE),
    );

    this.logger.info(
      `registered entry of equipment ${equipmentId} by actor ${actor.id} as session ${created.id}`,
    );

    await this.auditService.record(
      AuditAction.ACCESS_ENTRY,
      AuditEntityType.ACCESS_SESSION,
      created.id,
      actor,
      {
        equipmentId,
        expectedExitAt: created.expectedExitAt.toISOString(),
      },
    );

    return created;
  }

  public async registerExit(
    identifier: string,
    actor: ActorProfile,
    notes?: string,
  ): Promise<AccessSession> {
    const equipment =
      await this.equipmentRegistryService.resolveOrNotFound(identifier);
    const equipmentId = ObjectUtils.require(equipment, 'id');
    const sanitizedNotes = SanitizationUtils.sanitizeNote(notes);

    const active =
      await this.accessSessionRepository.findActiveForEquipment(equipmentId);
    if (!active) {
      throw AccessErrors.invalidState(
        `Equipment ${equipmentId} has no active access session`,
      );
    }

    if (active.equipmentId !== equipmentId) {
      await this.block(active, equipmentId, actor);
      throw AccessErrors.forbidden(
        `Access session ${active.id} does not belong to equipment ${equipmentId}`,
      );
    }

    const completed = await this.transactionService.inTransaction(
      async transaction =>
        this.apply(
          active,
          SessionOperation.EXIT,
          {
            exitAt: new Date(),
            accessType: AccessType.EXIT,
            ...(sanitizedNotes
              ? {
                  notes: StringUtils.appendLine(
                    active.notes,
                    `Exit: ${sanitizedNotes}`,
                  ),
                }
              : {}),
          },
          actor,
          transaction,
        ),
    );

    this.logger.info(
      `registered exit of equipment ${equipmentId} by actor ${actor.id} on session ${completed.id}`,
    );

    await this.auditService.record(
      AuditAction.ACCESS_EXIT,
      AuditEntityType.ACCESS_SESSION,
      completed.id,
      actor,
      {equipmentId},
    );

    return completed;
  }

  /**
   * Returns the open sessions whose expected exit is before `at`, moving each
   * ACTIVE one to EXPIRED. Repeated calls return the same set and write
   * nothing new.
   */
  public async scanExpired(
    at: Date = new Date(),
    actor: ActorProfile = SystemActor,
  ): Promise<AccessSession[]> {
    const candidates =
      await this.accessSessionRepository.findExpiredCandidates(at);

    const output: AccessSession[] = [];
    for (const candidate of candidates) {
      if (!SessionStateMachine.isOverdue(candidate, at)) {
        continue;
      }
      if (candidate.status === AccessSessionStatus.EXPIRED) {
        output.push(candidate);
        continue;
      }

      const expired = await this.expireOne(candidate, actor);
      if (expired) {
        output.push(expired);
      }
    }

    if (output.length) {
      this.logger.debug(
        `expiration scan at ${at.toISOString()} found ${output.length} overdue sessions`,
      );
    }

    return output;
  }

  public async forceExit(
    sessionId: number,
    actor: ActorProfile,
    reason: string,
  ): Promise<AccessSession> {
    if (actor.role !== Security.Role.ADMINISTRATOR) {
      throw AccessErrors.forbidden('Only administrators can force an exit');
    }
    const sanitizedReason = SanitizationUtils.sanitizeNote(reason);
    if (!sanitizedReason) {
      throw new HttpErrors.BadRequest('A reason is required to force an exit');
    }

    const session = await this.getSession(sessionId);
    const previousStatus = session.status;

    const completed = await this.transactionService.inTransaction(
      async transaction =>
        this.apply(
          session,
          SessionOperation.FORCE_EXIT,
          {
            exitAt: new Date(),
            accessType: AccessType.EXIT,
            notes: StringUtils.appendLine(
              session.notes,
              `Forced exit by ${actor.fullName}: ${sanitizedReason}`,
            ),
          },
          actor,
          transaction,
        ),
    );

    this.logger.info(
      `forced exit of session ${sessionId} by actor ${actor.id}: ${sanitizedReason}`,
    );

    await this.auditService.record(
      AuditAction.ACCESS_FORCED_EXIT,
      AuditEntityType.ACCESS_SESSION,
      completed.id,
      actor,
      {
        equipmentId: completed.equipmentId,
        previousStatus,
        reason: sanitizedReason,
      },
    );

    return completed;
  }

  public async listActive(): Promise<AccessSession[]> {
    return this.accessSessionRepository.findActiveAll();
  }

  public async listExpired(at: Date = new Date()): Promise<AccessSession[]> {
    return this.scanExpired(at);
  }

  public async getSession(id: number): Promise<AccessSession> {
    const session = await this.accessSessionRepository.findOne({where: {id}});
    if (!session) {
      throw AccessErrors.notFound(`Access session ${id} not found`);
    }
    return session;
  }

  public async equipmentHistory(
    equipmentId: number,
    pageable: Pageable,
  ): Promise<Page<AccessSession>> {
    await this.equipmentRegistryService.getOrNotFound(equipmentId);
    return this.accessSessionRepository.findByEquipment(equipmentId, pageable);
  }

  public async actorHistory(
    actorId: number,
    pageable: Pageable,
  ): Promise<Page<AccessSession>> {
    return this.accessSessionRepository.findByActor(actorId, pageable);
  }

  public async dateRangeHistory(
    start: Date,
    end: Date,
    pageable: Pageable,
  ): Promise<Page<AccessSession>> {
    SanitizationUtils.sanitizeDateRange(start, end);
    return this.accessSessionRepository.findByDateRange(start, end, pageable);
  }

  private async expireOne(
    session: AccessSession,
    actor: ActorProfile,
  ): Promise<AccessSession | null> {
    const expired = await this.transactionService.inTransaction(
      async transaction =>
        this.accessSessionRepository.compareAndSet(
          session,
          {
            status: SessionStateMachine.next(
              session.status,
              SessionOperation.EXPIRE,
            ),
          },
          actor.username,
          {transaction},
        ),
    );

    if (!expired) {
      // another writer moved it first: keep it only if it is expired now
      const current = await this.accessSessionRepository.findOne({
        where: {id: session.id},
      });
      return current?.status === AccessSessionStatus.EXPIRED ? current : null;
    }

    this.logger.info(
      `session ${expired.id} of equipment ${expired.equipmentId} expired, expected exit was ${expired.expectedExitAt.toISOString()}`,
    );

    await this.auditService.record(
      AuditAction.ACCESS_EXPIRED,
      AuditEntityType.ACCESS_SESSION,
      expired.id,
      actor,
      {
        equipmentId: expired.equipmentId,
        expectedExitAt: expired.expectedExitAt.toISOString(),
      },
    );

    return expired;
  }

  private async block(
    session: AccessSession,
    presentedEquipmentId: number,
    actor: ActorProfile,
  ): Promise<AccessSession> {
    const blocked = await this.transactionService.inTransaction(
      async transaction =>
        this.apply(
          session,
          SessionOperation.BLOCK,
          {
            exitAt: new Date(),
            notes: StringUtils.appendLine(
              session.notes,
              `Blocked: exit presented for equipment ${presentedEquipmentId}`,
            ),
          },
          actor,
          transaction,
        ),
    );

    this.logger.warn(
      `session ${session.id} of equipment ${session.equipmentId} blocked on exit presented for equipment ${presentedEquipmentId}`,
    );

    await this.auditService.record(
      AuditAction.ACCESS_BLOCKED,
      AuditEntityType.ACCESS_SESSION,
      blocked.id,
      actor,
      {
        sessionEquipmentId: session.equipmentId,
        presentedEquipmentId,
      },
    );

    return blocked;
  }

  private async apply(
    session: AccessSession,
    operation: SessionOperation,
    changes: DataObject<AccessSession>,
    actor: ActorProfile,
    transaction?: juggler.Transaction,
  ): Promise<AccessSession> {
    const status = SessionStateMachine.next(session.status, operation);

    const updated = await this.accessSessionRepository.compareAndSet(
      session,
      {...changes, status},
      actor.username,
      {transaction},
    );
    if (!updated) {
      throw AccessErrors.concurrentModification('Access session', session.id);
    }
    return updated;
  }

  private resolveMaxStayDays(policy?: AccessPolicy): number {
    const maxStayDays = policy?.maxStayDays ?? this.accessConfig.maxStayDays;
    if (!Number.isFinite(maxStayDays) || maxStayDays <= 0) {
      throw new HttpErrors.BadRequest(`Invalid maximum stay: ${maxStayDays}`);
    }
    return maxStayDays;
  }
}
