export * from './audit-entity.model';
