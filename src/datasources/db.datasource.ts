import {inject, lifeCycleObserver, LifeCycleObserver} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {IsolationLevel, juggler} from '@loopback/repository';
import {LoggerBindings} from '../key';
import {AppCustomDatasourceConfig} from '../utils/configuration-utils';

const config: AppCustomDatasourceConfig = {
  name: 'Db',
  connector: 'mysql',
  enableTransactions: true,
  host: '',
  port: 0,
  user: '',
  password: '',
  database: '',
};

// Observe application's life cycle to disconnect the datasource when
// application is stopped. This allows the application to be shut down
// gracefully. The `stop()` method is inherited from `juggler.DataSource`.
// Learn more at https://loopback.io/doc/en/lb4/Life-cycle.html
@lifeCycleObserver('datasource')
export class DbDataSource
  extends juggler.DataSource
  implements LifeCycleObserver
{
  static dataSourceName = 'Db';
  static readonly defaultConfig = config;
  configuration: AppCustomDatasourceConfig;

  constructor(
    @inject(LoggerBindings.DATASOURCE_LOGGER) private logger: WinstonLogger,
    @inject('datasources.config.Db', {optional: true})
    dsConfig: AppCustomDatasourceConfig = config,
  ) {
    super(dsConfig);
    this.configuration = dsConfig;
  }

  /**
   * Runs `fn` inside a new transaction, committing when it resolves and
   * rolling back when it rejects. With transactions disabled (the in-memory
   * connector) `fn` receives no transaction and runs as-is.
   */
  public async inTransaction<T>(
    fn: (tx?: juggler.Transaction) => Promise<T>,
    isolationLevel: IsolationLevel = IsolationLevel.READ_COMMITTED,
  ): Promise<T> {
    if (!this.configuration.enableTransactions) {
      this.logger.debug(
        'transactions are disabled. executing untransactionally',
      );
      return fn(undefined);
    }

    const tx = await this.beginTransaction(isolationLevel);
    this.logger.debug(`[tx] TRANSACTION OPENED (${isolationLevel})`);
    try {
      const result: T = await fn(tx);
      this.logger.debug('[tx] committing transaction');
      await tx.commit();
      this.logger.debug('[tx] TRANSACTION COMMITTED');
      return result;
    } catch (err) {
      this.logger.debug('[tx] error in transaction, rolling back', err);
      await tx.rollback();
      this.logger.debug('[tx] TRANSACTION ROLLED BACK');
      throw err;
    }
  }
}
