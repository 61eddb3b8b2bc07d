import {BindingKey} from '@loopback/core';
import {LoggingBindings, WinstonLogger} from '@loopback/logging';
import {ActorAuthenticationRequirements} from './security/security-constants';
import {ErrorService} from './services/error.service';
import {TokenAuthenticationActorService} from './services/token-actor-auth.service';
import {
  AppCustomAccessConfig,
  AppCustomConfig,
  AppCustomSecurityConfig,
} from './utils/configuration-utils';

export namespace TokenActorAuthenticationStrategyBindings {
  export const ACTOR_SERVICE =
    BindingKey.create<TokenAuthenticationActorService>(
      'services.authentication.token.actor.service',
    );

  export const DEFAULT_OPTIONS =
    BindingKey.create<ActorAuthenticationRequirements>(
      'services.authentication.token.actor.defaultoptions',
    );
}

export namespace ConfigurationBindings {
  export const ROOT_CONFIG = BindingKey.create<AppCustomConfig>(
    'accessgateway.config.root',
  );
  export const SECURITY_CONFIG = BindingKey.create<AppCustomSecurityConfig>(
    'accessgateway.config.security',
  );
  export const ACCESS_CONFIG = BindingKey.create<AppCustomAccessConfig>(
    'accessgateway.config.access',
  );
}

export namespace LoggerBindings {
  export const ROOT_LOGGER = LoggingBindings.WINSTON_LOGGER;
  export const DATASOURCE_LOGGER = BindingKey.create<WinstonLogger>(
    'accessgateway.logger.datasource',
  );
  export const SECURITY_LOGGER = BindingKey.create<WinstonLogger>(
    'accessgateway.logger.security',
  );
  export const SERVICE_LOGGER = BindingKey.create<WinstonLogger>(
    'accessgateway.logger.service',
  );
}

export namespace ErrorBindings {
  export const ERROR_SERVICE = BindingKey.create<ErrorService>(
    'accessgateway.error.service',
  );
}
