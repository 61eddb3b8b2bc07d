import {model, property} from '@loopback/repository';
import {AuditLogDto} from '../dto/audit-log-dto.model';
import {PagedResponse} from '../pagination/paged-response.model';

@model()
export class ListAuditLogsResponse extends PagedResponse<AuditLogDto> {
  @property({
    type: 'array',
    required: true,
    itemType: AuditLogDto,
  })
  content!: AuditLogDto[];

  constructor(data?: Partial<ListAuditLogsResponse>) {
    super(data);
  }
}
