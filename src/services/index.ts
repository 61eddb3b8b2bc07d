export * from './access-errors';
export * from './access-session.service';
export * from './actor-profile.service';
export * from './audit.service';
export * from './equipment-registry.service';
export * from './error.service';
export * from './lock.service';
export * from './mapper.service';
export * from './report.service';
export * from './session-state-machine';
export * from './token-actor-auth.service';
export * from './transaction-manager.service';
