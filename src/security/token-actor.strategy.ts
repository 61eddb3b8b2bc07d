import {
  asAuthStrategy,
  AuthenticationBindings,
  AuthenticationMetadata,
  AuthenticationStrategy,
} from '@loopback/authentication';
import {Getter, inject, injectable, service} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {
  asSpecEnhancer,
  HttpErrors,
  mergeSecuritySchemeToSpec,
  OASEnhancer,
  OpenApiSpec,
  Request,
} from '@loopback/rest';
import {LoggerBindings, TokenActorAuthenticationStrategyBindings} from '../key';
import {AccessErrors} from '../services/access-errors';
import {
  ActorProfile,
  ActorProfileService,
} from '../services/actor-profile.service';
import {TokenAuthenticationActorService} from '../services/token-actor-auth.service';
import {
  ActorAuthenticationRequirements,
  TokenActorAuthenticationStrategyCredentials,
} from './security-constants';

@injectable(asAuthStrategy, asSpecEnhancer)
export class TokenActorAuthenticationStrategy
  implements AuthenticationStrategy, OASEnhancer
{
  name = 'token';

  constructor(
    @inject(LoggerBindings.SECURITY_LOGGER) private logger: WinstonLogger,

    @inject(TokenActorAuthenticationStrategyBindings.ACTOR_SERVICE)
    private actorService: TokenAuthenticationActorService,

    @service(ActorProfileService)
    public actorProfileService: ActorProfileService,

    @inject.getter(AuthenticationBindings.METADATA)
    readonly getMetaData: Getter<AuthenticationMetadata[] | undefined>,

    @inject(TokenActorAuthenticationStrategyBindings.DEFAULT_OPTIONS)
    private defaultOptions: ActorAuthenticationRequirements,
  ) {}

  async authenticate(request: Request): Promise<ActorProfile | undefined> {
    const options = await this.processOptions();

    const credentials: TokenActorAuthenticationStrategyCredentials | null =
      this.actorService.extractCredentials(request);

    if (!credentials) {
      throw new HttpErrors.Unauthorized(`Authorization header not found.`);
    }

    const verifiedPayload = await this.actorService.verifyCredentials(
      credentials,
    );

    const profile = await this.actorProfileService.profileFromToken(
      verifiedPayload,
    );

    this.logger.debug('profiled actor', profile);

    if (!(await this.actorProfileService.authorize(profile, options))) {
      throw AccessErrors.forbidden(`Not allowed.`);
    }

    return profile;
  }

  async processOptions(): Promise<ActorAuthenticationRequirements> {
    const controllerMethodAuthenticationMetadata = await this.getMetaData();

    //override default options with request-level options
    if (controllerMethodAuthenticationMetadata?.length) {
      return Object.assign(
        {},
        this.defaultOptions,
        controllerMethodAuthenticationMetadata[0].options,
      );
    }

    return {...this.defaultOptions};
  }

  modifySpec(spec: OpenApiSpec): OpenApiSpec {
    return mergeSecuritySchemeToSpec(spec, this.name, {
      type: 'http',
      scheme: 'bearer',
    });
  }
}
