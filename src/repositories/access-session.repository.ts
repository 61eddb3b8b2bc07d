import {inject} from '@loopback/core';
import {DataObject, Options, Where} from '@loopback/repository';
import {DbDataSource} from '../datasources';
import {
  AccessSession,
  AccessSessionRelations,
  AccessSessionStatus,
  Page,
  Pageable,
} from '../models';
import {PaginationRepository} from './proto';

const MOST_RECENT_FIRST = ['createdAt DESC', 'id DESC'];

/**
 * The session ledger. Every write to a stored session goes through
 * `compareAndSet`, which only succeeds against the version that was read.
 */
export class AccessSessionRepository extends PaginationRepository<
  AccessSession,
  typeof AccessSession.prototype.id,
  AccessSessionRelations
> {
  constructor(@inject('datasources.Db') dataSource: DbDataSource) {
    super(AccessSession, dataSource);
  }

  public async findActiveForEquipment(
    equipmentId: number,
    options?: Options,
  ): Promise<AccessSession | null> {
    return this.findOne(
      {
        where: {
          equipmentId,
          status: AccessSessionStatus.ACTIVE,
        },
        order: ['entryAt DESC', 'id DESC'],
      },
      options,
    );
  }

  public async findActiveAll(options?: Options): Promise<AccessSession[]> {
    return this.find(
      {
        where: {
          status: AccessSessionStatus.ACTIVE,
        },
        order: ['entryAt DESC', 'id DESC'],
      },
      options,
    );
  }

  /**
   * Sessions still open (ACTIVE or already EXPIRED) whose expected exit is
   * strictly before `at`.
   */
  public async findExpiredCandidates(
    at: Date,
    options?: Options,
  ): Promise<AccessSession[]> {
    return this.find(
      {
        where: {
          status: {
            inq: [AccessSessionStatus.ACTIVE, AccessSessionStatus.EXPIRED],
          },
          expectedExitAt: {
            lt: at,
          },
        },
        order: ['expectedExitAt ASC', 'id ASC'],
      },
      options,
    );
  }

  /**
   * Applies `changes` only if the stored row still carries the version of
   * `session`. Returns the refreshed row, or null when another writer got
   * there first.
   */
  public async compareAndSet(
    session: AccessSession,
    changes: DataObject<AccessSession>,
    modifiedBy: string,
    options?: Options,
  ): Promise<AccessSession | null> {
    const where: Where<AccessSession> = {
      id: session.id,
      version: session.version,
    };

    const result = await this.updateAll(
      {
        ...changes,
        version: session.version + 1,
        modifiedBy,
        modifiedAt: new Date(),
      },
      where,
      options,
    );

    if (result.count !== 1) {
      return null;
    }

    return this.findById(session.id, undefined, options);
  }

  public async findByEquipment(
    equipmentId: number,
    pageable: Pageable,
    options?: Options,
  ): Promise<Page<AccessSession>> {
    return this.findPage(
      {
        where: {equipmentId},
        order: MOST_RECENT_FIRST,
      },
      pageable,
      options,
    );
  }

  public async findByActor(
    actorId: number,
    pageable: Pageable,
    options?: Options,
  ): Promise<Page<AccessSession>> {
    return this.findPage(
      {
        where: {actorId},
        order: MOST_RECENT_FIRST,
      },
      pageable,
      options,
    );
  }

  public async findByDateRange(
    start: Date,
    end: Date,
    pageable: Pageable,
    options?: Options,
  ): Promise<Page<AccessSession>> {
    return this.findPage(
      {
        where: {
          createdAt: {
            between: [start, end],
          },
        },
        order: MOST_RECENT_FIRST,
      },
      pageable,
      options,
    );
  }
}
