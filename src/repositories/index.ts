export * from './access-session.repository';
export * from './audit-log.repository';
export * from './equipment.repository';
export * from './proto';
export * from './resource-lock.repository';
