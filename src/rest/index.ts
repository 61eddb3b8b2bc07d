export * from './access/force-exit-request.model';
export * from './access/list-sessions-response.model';
export * from './access/register-access-request.model';
export * from './audit-log/list-audit-logs-response.model';
export * from './dto/access-session-dto.model';
export * from './dto/active-equipment-dto.model';
export * from './dto/audit-fields-dto.model';
export * from './dto/audit-log-dto.model';
export * from './dto/equipment-dto.model';
export * from './equipment/create-equipment-request.model';
export * from './equipment/list-equipment-response.model';
export * from './equipment/set-equipment-active-request.model';
export * from './equipment/update-equipment-request.model';
export * from './pagination/paged-response.model';
export * from './report/access-summary-response.model';
export * from './report/actor-activity-row.model';
export * from './report/equipment-report-row.model';
