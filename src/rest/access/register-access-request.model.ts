import {Model, model, property} from '@loopback/repository';

/**
 * Body of both entry and exit registrations.
 */
@model()
export class RegisterAccessRequest extends Model {
  @property({
    type: 'string',
    required: true,
    jsonSchema: {
      minLength: 1,
      maxLength: 255,
    },
  })
  equipmentIdentifier!: string;

  @property({
    type: 'string',
    required: false,
    jsonSchema: {
      maxLength: 2000,
    },
  })
  notes?: string;

  constructor(data?: Partial<RegisterAccessRequest>) {
    super(data);
  }
}
