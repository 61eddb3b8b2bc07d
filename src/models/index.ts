export * from './access-session.model';
export * from './audit-log.model';
export * from './equipment.model';
export * from './pagination/pagination.model';
export * from './proto';
export * from './resource-lock.model';
