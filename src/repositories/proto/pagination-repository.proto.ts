import {
  DefaultTransactionalRepository,
  Entity,
  Filter,
  juggler,
  Options,
} from '@loopback/repository';
import {Page, Pageable} from '../../models/pagination/pagination.model';
import {PaginationUtils} from '../../utils/pagination-utils';

export type PaginationFilter<T extends Entity> = Omit<
  Filter<T>,
  'limit' | 'skip' | 'offset'
> &
  Required<Pick<Filter<T>, 'order'>>;

export class PaginationRepository<
  T extends Entity,
  ID,
  Relations extends object = {},
> extends DefaultTransactionalRepository<T, ID, Relations> {
  constructor(
    entityClass: typeof Entity & {
      prototype: T;
    },
    dataSource: juggler.DataSource,
  ) {
    super(entityClass, dataSource);
  }

  /**
   * Runs a COUNT then a bounded FETCH with the same filter.
   */
  public async findPage(
    filter: PaginationFilter<T>,
    pageRequest: Pageable,
    options?: Options,
  ): Promise<Page<T & Relations>> {
    const {skip, limit} = PaginationUtils.parsePagination(
      pageRequest.skip,
      pageRequest.limit,
    );

    const output = PaginationUtils.emptyPage<T & Relations>({skip, limit});

    // do COUNT query
    const countResult = await this.count(filter?.where, options);
    if (countResult.count <= 0) {
      return output;
    }

    // do FETCH query
    const fetchResult = await this.find(
      {
        ...filter,
        limit,
        skip,
      },
      options,
    );

    output.totalElements = countResult.count;
    output.content = fetchResult;
    output.numberOfElements = fetchResult.length;
    output.hasContent = fetchResult.length > 0;
    output.hasNext = skip + fetchResult.length < countResult.count;

    return output;
  }
}
