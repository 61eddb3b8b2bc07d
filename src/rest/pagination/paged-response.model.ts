import {model, Model, property} from '@loopback/repository';

@model()
export abstract class PagedResponse<T> extends Model {
  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  numberOfElements!: number;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  totalElements!: number;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  skip!: number;

  @property({
    type: 'number',
    required: true,
    jsonSchema: {
      type: 'integer',
      format: 'int32',
    },
  })
  limit!: number;

  @property({
    type: 'boolean',
    required: true,
  })
  hasNext!: boolean;

  abstract content: T[];

  constructor(data?: Partial<PagedResponse<T>>) {
    super(data);
  }
}
