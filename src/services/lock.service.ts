import {BindingScope, inject, injectable, service} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {juggler, repository} from '@loopback/repository';
import AsyncLock from 'async-lock';
import {v4 as uuidv4} from 'uuid';
import {ConfigurationBindings, LoggerBindings} from '../key';
import {ResourceLock} from '../models';
import {ResourceLockRepository} from '../repositories';
import {AppCustomAccessConfig} from '../utils';
import {AccessErrors} from './access-errors';
import {TransactionService} from './transaction-manager.service';

/**
 * Serializes session openings per equipment item across processes.
 *
 * A lock is a row in the lock table leased for `access.entryLockDuration` ms.
 * Within one process, attempts on the same resource are also queued on an
 * in-memory semaphore, since not every connector enforces the unique index.
 */
@injectable({scope: BindingScope.SINGLETON})
export class LockService {
  private localSemaphore: AsyncLock = new AsyncLock();

  constructor(
    @inject(LoggerBindings.SERVICE_LOGGER) private logger: WinstonLogger,
    @inject(ConfigurationBindings.ACCESS_CONFIG)
    private accessConfig: AppCustomAccessConfig,
    @repository(ResourceLockRepository)
    private resourceLockRepository: ResourceLockRepository,
    @service(TransactionService)
    private transactionService: TransactionService,
  ) {}

  public static equipmentSessionResource(equipmentId: number): string {
    return `equipment.${equipmentId}.session`;
  }

  /**
   * Runs `task` holding the session lock of the equipment item. Waits up to
   * `access.entryLockTimeout` ms, then fails with `RESOURCE_BUSY`.
   */
  public async withEquipmentSessionLock<T>(
    equipmentId: number,
    task: () => Promise<T>,
  ): Promise<T> {
    const resourceCode = LockService.equipmentSessionResource(equipmentId);

    const lock = await this.acquire(resourceCode);
    if (!lock) {
      throw AccessErrors.busy(
        `Equipment ${equipmentId} is being registered by another request, retry later`,
      );
    }

    try {
      return await task();
    } finally {
      await this.release(lock);
    }
  }

  private async acquire(resourceCode: string): Promise<ResourceLock | null> {
    const timeout = this.accessConfig.entryLockTimeout;
    const retryEvery = this.accessConfig.entryLockRetryEvery;
    let waitedFor = 0;

    while (waitedFor <= timeout) {
      const lock = await this.localSemaphore.acquire(resourceCode, async () =>
        this.attemptAcquisition(resourceCode),
      );
      if (lock) {
        return lock;
      }
      if (waitedFor + retryEvery > timeout) {
        break;
      }
      await this.sleep(retryEvery);
      waitedFor += retryEvery;
    }

    this.logger.warn(
      `could not lock ${resourceCode} within ${timeout} ms, giving up`,
    );
    return null;
  }

  private async attemptAcquisition(
    resourceCode: string,
  ): Promise<ResourceLock | null> {
    try {
      return await this.transactionService.inTransaction(async transaction => {
        const held = await this.findLiveLock(resourceCode, transaction);
        if (held) {
          this.logger.debug(
            `${resourceCode} is held by ${held.ownerCode} until ${held.expiresAt.toISOString()}`,
          );
          return null;
        }

        return this.resourceLockRepository.create(
          new ResourceLock({
            resourceCode,
            ownerCode: uuidv4(),
            expiresAt: new Date(
              Date.now() + this.accessConfig.entryLockDuration,
            ),
          }),
          {transaction},
        );
      });
    } catch (err) {
      // another process inserted the row between our read and our write
      if (AccessErrors.isDuplicateEntry(err)) {
        return null;
      }
      throw err;
    }
  }

  /**
   * Returns the unexpired lock on the resource, deleting any whose lease
   * has run out.
   */
  private async findLiveLock(
    resourceCode: string,
    transaction?: juggler.Transaction,
  ): Promise<ResourceLock | null> {
    const rows = await this.resourceLockRepository.find(
      {where: {resourceCode}},
      {transaction},
    );

    const now = Date.now();
    let live: ResourceLock | null = null;
    for (const row of rows) {
      if (row.expiresAt.getTime() > now) {
        live = row;
        continue;
      }
      this.logger.warn(
        `lease of ${row.resourceCode} held by ${row.ownerCode} ran out at ${row.expiresAt.toISOString()}, taking over`,
      );
      await this.resourceLockRepository.deleteAll(
        {id: row.id, ownerCode: row.ownerCode},
        {transaction},
      );
    }
    return live;
  }

  private async release(lock: ResourceLock): Promise<void> {
    try {
      const {count} = await this.localSemaphore.acquire(
        lock.resourceCode,
        async () =>
          this.resourceLockRepository.deleteAll({
            id: lock.id,
            ownerCode: lock.ownerCode,
          }),
      );
      if (count !== 1) {
        this.logger.warn(
          `lock on ${lock.resourceCode} was gone before release, its lease may have run out`,
        );
      }
    } catch (err) {
      // the lease still bounds how long a lost release keeps the resource busy
      this.logger.error(`error releasing lock on ${lock.resourceCode}`, err);
    }
  }

  protected async sleep(duration: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, duration));
  }
}
