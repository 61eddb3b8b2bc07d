import {
  AuthenticationComponent,
  registerAuthenticationStrategy,
} from '@loopback/authentication';
import {BootMixin} from '@loopback/boot';
import {HealthComponent, HealthTags} from '@loopback/health';
import {
  format,
  LoggingBindings,
  LoggingComponent,
  WinstonTransports,
} from '@loopback/logging';
import {RepositoryMixin} from '@loopback/repository';
import {RestApplication, RestBindings} from '@loopback/rest';
import {
  RestExplorerBindings,
  RestExplorerComponent,
} from '@loopback/rest-explorer';
import {ServiceMixin} from '@loopback/service-proxy';
import winston from 'winston';
import {DatabaseHealthCheckProvider} from './health/db.healthcheck';
import {
  ConfigurationBindings,
  ErrorBindings,
  LoggerBindings,
  TokenActorAuthenticationStrategyBindings,
} from './key';
import {TokenActorAuthenticationStrategy} from './security';
import {MySequence} from './sequence';
import {ErrorService, TokenAuthenticationActorService} from './services';
import {AppCustomConfig} from './utils/configuration-utils';

export class EquipmentAccessApplication extends BootMixin(
  ServiceMixin(RepositoryMixin(RestApplication)),
) {
  constructor(options: AppCustomConfig) {
    super(options);

    // Set up the custom sequence
    this.sequence(MySequence);

    // configure logging system
    this.configureLogging(options);

    // configure error handling
    this.configureErrorHandling();

    // configure rest explorer
    this.configureRestExplorer();

    // bind configuration
    this.bindConfiguration(options);

    // mount authentication system
    this.configureAuthentication();

    // configure health check
    this.configureHealthChecks();

    // Customize @loopback/boot Booter Conventions here
    this.projectRoot = __dirname;

    // sources are booted as .ts under the test runner, as .js once built
    this.bootOptions = {
      controllers: {
        dirs: ['controllers'],
        extensions: ['.controller.js', '.controller.ts'],
        nested: true,
      },
      repositories: {
        dirs: ['repositories'],
        extensions: ['.repository.js', '.repository.ts'],
        nested: true,
      },
      datasources: {
        dirs: ['datasources'],
        extensions: ['.datasource.js', '.datasource.ts'],
        nested: true,
      },
      services: {
        dirs: ['services'],
        extensions: ['.service.js', '.service.ts'],
        nested: true,
      },
      interceptors: {
        dirs: ['interceptors'],
        extensions: ['.interceptor.js', '.interceptor.ts'],
        nested: true,
      },
    };
  }

  private configureErrorHandling() {
    this.bind(ErrorBindings.ERROR_SERVICE).toClass(ErrorService);
  }

  private configureLogging(options: AppCustomConfig) {
    this.configure(LoggingBindings.COMPONENT).to({
      enableFluent: false, // default to true
      enableHttpAccessLog: true, // default to true
    });

    const transportProvider = (level: string) =>
      new WinstonTransports.Console({
        level,
        format: format.combine(format.colorize(), format.simple()),
      });

    const standardFormat = format.combine(format.colorize(), format.simple());

    this.configure(LoggerBindings.ROOT_LOGGER).to({
      level: options.logging.rootLevel,
      format: standardFormat,
    });

    this.bind(LoggerBindings.DATASOURCE_LOGGER).to(
      winston.createLogger({
        transports: [transportProvider(options.logging.datasourceLevel)],
        format: standardFormat,
      }),
    );

    this.bind(LoggerBindings.SECURITY_LOGGER).to(
      winston.createLogger({
        transports: [transportProvider(options.logging.securityLevel)],
        format: standardFormat,
      }),
    );

    this.bind(LoggerBindings.SERVICE_LOGGER).to(
      winston.createLogger({
        transports: [transportProvider(options.logging.serviceLevel)],
        format: standardFormat,
      }),
    );

    this.component(LoggingComponent);
  }

  private configureAuthentication() {
    this.component(AuthenticationComponent);

    // token auth strategy
    this.bind(TokenActorAuthenticationStrategyBindings.ACTOR_SERVICE).toClass(
      TokenAuthenticationActorService,
    );

    this.bind(TokenActorAuthenticationStrategyBindings.DEFAULT_OPTIONS).to({
      context: 'token-auth-ctx',
    });

    registerAuthenticationStrategy(this, TokenActorAuthenticationStrategy);
  }

  private configureRestExplorer() {
    this.component(RestExplorerComponent);

    this.configure(RestExplorerBindings.COMPONENT).to({
      path: '/explorer',
    });
  }

  private bindConfiguration(options: AppCustomConfig) {
    // configure error handling
    this.bind(RestBindings.ERROR_WRITER_OPTIONS).to({
      debug: options.security.exposeErrorDetails,
    });

    // bind application config
    this.bind(ConfigurationBindings.ROOT_CONFIG).to(options);

    this.bind(ConfigurationBindings.SECURITY_CONFIG).to(options.security);

    this.bind(ConfigurationBindings.ACCESS_CONFIG).to(options.access);

    // bind datasource config
    this.bind('datasources.config.Db').to(options.datasource);
  }

  private configureHealthChecks() {
    this.component(HealthComponent);

    this.bind('health.DatabaseHealthCheckProvider')
      .toProvider(DatabaseHealthCheckProvider)
      .tag(HealthTags.READY_CHECK);
  }
}
