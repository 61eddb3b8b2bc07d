import {model, property} from '@loopback/repository';
import {AccessSessionDto} from '../dto/access-session-dto.model';
import {PagedResponse} from '../pagination/paged-response.model';

@model()
export class ListSessionsResponse extends PagedResponse<AccessSessionDto> {
  @property({
    type: 'array',
    required: true,
    itemType: AccessSessionDto,
  })
  content!: AccessSessionDto[];

  constructor(data?: Partial<ListSessionsResponse>) {
    super(data);
  }
}
