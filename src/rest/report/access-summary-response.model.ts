import {Model, model, property} from '@loopback/repository';

@model()
export class AccessSummaryResponse extends Model {
  @property({
    type: 'number',
    required: true,
  })
  totalEntries!: number;

  @property({
    type: 'number',
    required: true,
  })
  totalExits!: number;

  @property({
    type: 'number',
    required: true,
  })
  currentlyInside!: number;

  @property({
    type: 'number',
    required: true,
  })
  expiredSessions!: number;

  @property({
    type: 'number',
    required: true,
  })
  totalEquipment!: number;

  @property({
    type: 'date',
    required: true,
  })
  periodStart!: Date;

  @property({
    type: 'date',
    required: true,
  })
  periodEnd!: Date;

  constructor(data?: Partial<AccessSummaryResponse>) {
    super(data);
  }
}
