import {BindingScope, inject, injectable} from '@loopback/core';
import {IsolationLevel, juggler} from '@loopback/repository';
import {DbDataSource} from '../datasources';

@injectable({scope: BindingScope.SINGLETON})
export class TransactionService {
  constructor(@inject('datasources.Db') private dataSource: DbDataSource) {}

  public async inTransaction<T>(
    fn: (tx?: juggler.Transaction) => Promise<T>,
    isolationLevel: IsolationLevel = IsolationLevel.READ_COMMITTED,
  ): Promise<T> {
    return this.dataSource.inTransaction(fn, isolationLevel);
  }
}
