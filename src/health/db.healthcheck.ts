import {inject, Provider} from '@loopback/core';
import {ReadyCheck} from '@loopback/health';
import {WinstonLogger} from '@loopback/logging';
import {DbDataSource} from '../datasources';
import {LoggerBindings} from '../key';

/**
 * Ready check passing once the `Db` datasource answers a ping.
 */
export class DatabaseHealthCheckProvider implements Provider<ReadyCheck> {
  constructor(
    @inject(LoggerBindings.DATASOURCE_LOGGER) private logger: WinstonLogger,
    @inject('datasources.Db') private dataSource: DbDataSource,
  ) {}

  value(): ReadyCheck {
    return async () => {
      this.logger.debug('checking database health status');
      try {
        await this.dataSource.ping();
      } catch (err) {
        this.logger.error('database health check failed', err);
        throw err;
      }
    };
  }
}
