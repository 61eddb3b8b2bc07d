export * from './security-constants';
export * from './token-actor.strategy';
