import {
  globalInterceptor,
  inject,
  Interceptor,
  InvocationContext,
  InvocationResult,
  Provider,
  ValueOrPromise,
} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {HttpErrors, Request, RestBindings} from '@loopback/rest';
import {SecurityBindings} from '@loopback/security';

import {ErrorBindings, LoggerBindings} from '../key';
import {ActorProfile, ErrorService} from '../services';

/**
 * Reports unexpected failures (anything that is not a client error) of
 * controller invocations to the error service, then rethrows them.
 */
@globalInterceptor('', {tags: {name: 'RollbarErrorHandler'}})
export class RollbarErrorHandlerInterceptor implements Provider<Interceptor> {
  constructor(
    @inject(LoggerBindings.ROOT_LOGGER) private logger: WinstonLogger,
    @inject(ErrorBindings.ERROR_SERVICE) private errorService: ErrorService,
    @inject(RestBindings.Http.REQUEST, {optional: true})
    private req?: Request,
    @inject(SecurityBindings.USER, {optional: true})
    private actor?: ActorProfile,
  ) {}

  value() {
    return this.intercept.bind(this);
  }

  async intercept(
    invocationCtx: InvocationContext,
    next: () => ValueOrPromise<InvocationResult>,
  ) {
    try {
      return await next();
    } catch (err) {
      if (this.shouldReport(err)) {
        this.logger.warn(
          `request error in ${invocationCtx.targetName}`,
          err,
        );
        await this.errorService.reportRequestError(
          err instanceof Error ? err : new Error(String(err)),
          this.req,
          this.actor,
        );
      }

      throw err;
    }
  }

  private shouldReport(err: unknown): boolean {
    return !(err instanceof HttpErrors.HttpError && err.status < 500);
  }
}
