import Rollbar from 'rollbar';

import {inject} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {Request, RestBindings} from '@loopback/rest';
import {SecurityBindings} from '@loopback/security';

import {ConfigurationBindings, LoggerBindings} from '../key';
import {AppCustomConfig, ConfigurationUtils} from '../utils';
import {ActorProfile} from './actor-profile.service';

export type ErrorReportDetails = {[key: string]: unknown};

export class ErrorService {
  rollbarConfig: Rollbar.Configuration;
  rollbar: Rollbar;

  constructor(
    @inject(LoggerBindings.ROOT_LOGGER) private logger: WinstonLogger,
    @inject(ConfigurationBindings.ROOT_CONFIG)
    private configuration: AppCustomConfig,
    @inject(SecurityBindings.USER, {optional: true})
    private actor?: ActorProfile,
    @inject(RestBindings.Http.REQUEST, {optional: true}) private req?: Request,
  ) {
    this.rollbarConfig = {
      accessToken: configuration.errorHandling.rollbarToken,
      enabled: configuration.errorHandling.enableRollbar,
      captureUncaught: false,
      captureUnhandledRejections: false,
      captureUsername: true,
      environment: ConfigurationUtils.getEnv(),
    };

    this.rollbar = new Rollbar(this.rollbarConfig);
  }

  get rollbarEnabled(): boolean {
    return this.configuration.errorHandling.enableRollbar;
  }

  async reportError(
    message: string,
    additional?: ErrorReportDetails,
  ): Promise<void> {
    if (!this.rollbarEnabled) {
      this.logger.warn('error reporting to rollbar is disabled.');
      this.logger.warn('reported error would be: ' + message);
      return;
    }

    this.safe(() =>
      this.rollbar.error(
        new Error(message),
        this.req ? this.toRollbarRequest(this.req, this.actor) : undefined,
        additional,
      ),
    );
  }

  async reportRequestError(
    error: Error,
    request: Request | undefined,
    actor: ActorProfile | undefined,
    additional?: ErrorReportDetails,
  ): Promise<void> {
    if (!this.rollbarEnabled) {
      this.logger.warn('error reporting to rollbar is disabled.');
      this.logger.warn('reported error would be', error);
      return;
    }

    this.safe(() =>
      this.rollbar.error(
        error,
        request ? this.toRollbarRequest(request, actor) : undefined,
        additional,
      ),
    );
  }

  private safe(task: () => void) {
    try {
      task();
    } catch (err) {
      this.logger.error('ERROR REPORTING TO ROLLBAR', err);
    }
  }

  private toRollbarRequest(
    input: Request,
    actor: ActorProfile | undefined,
  ): object {
    return {
      headers: input.headers,
      method: input.method,
      url: input.url,
      // eslint-disable-next-line @typescript-eslint/naming-convention
      user_id: actor ? String(actor.id) : undefined,
      // eslint-disable-next-line @typescript-eslint/naming-convention
      rollbar_person: this.toRollbarPrincipal(actor),
    };
  }

  private toRollbarPrincipal(actor: ActorProfile | undefined): object | undefined {
    if (!actor) {
      return undefined;
    }

    return {
      id: String(actor.id),
      username: actor.username,
    };
  }
}
