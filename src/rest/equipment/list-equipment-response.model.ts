import {model, property} from '@loopback/repository';
import {EquipmentDto} from '../dto/equipment-dto.model';
import {PagedResponse} from '../pagination/paged-response.model';

@model()
export class ListEquipmentResponse extends PagedResponse<EquipmentDto> {
  @property({
    type: 'array',
    required: true,
    itemType: EquipmentDto,
  })
  content!: EquipmentDto[];

  constructor(data?: Partial<ListEquipmentResponse>) {
    super(data);
  }
}
