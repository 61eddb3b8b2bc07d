import * as jwt from 'jsonwebtoken';

import {inject} from '@loopback/core';
import {WinstonLogger} from '@loopback/logging';
import {HttpErrors, Request} from '@loopback/rest';

import {ConfigurationBindings, LoggerBindings} from '../key';
import {TokenActorAuthenticationStrategyCredentials} from '../security/security-constants';
import {AppCustomSecurityConfig} from '../utils/configuration-utils';

export interface SignedAuthenticationTokenPayload {
  iat?: number;
  iss?: string;
  sub: string;
  jti?: string;
  exp?: number;
  name?: string;
  // eslint-disable-next-line @typescript-eslint/naming-convention
  preferred_username?: string;
  role?: string;
}

export class TokenAuthenticationActorService {
  constructor(
    @inject(LoggerBindings.SECURITY_LOGGER) private logger: WinstonLogger,
    @inject(ConfigurationBindings.SECURITY_CONFIG)
    private securityConfig: AppCustomSecurityConfig,
  ) {
    if (!securityConfig.tokenSecret?.length) {
      throw new Error('tokenSecret must be provided');
    }
  }

  async verifyCredentials(
    credentials: TokenActorAuthenticationStrategyCredentials,
  ): Promise<SignedAuthenticationTokenPayload> {
    if (!credentials || !credentials.token) {
      throw new HttpErrors.Unauthorized(`Missing credentials`);
    }

    let verified: jwt.Jwt;

    try {
      verified = jwt.verify(credentials.token, this.securityConfig.tokenSecret, {
        complete: true,
        algorithms: [this.securityConfig.algorithm],
        issuer: this.securityConfig.tokenIssuer,
        audience: this.securityConfig.tokenAudience,
      });
    } catch (err) {
      this.logger.error('token verification failed:', err);
      throw new HttpErrors.Unauthorized(`Token verification failed`);
    }

    this.logger.debug('decoded and verified jwt token', verified);

    const parsed = this.toPayload(verified.payload);

    if (this.logger.isDebugEnabled()) {
      this.logger.debug('parsed issuedAt = ' + parsed.iat);
      this.logger.debug('parsed expiresAt = ' + parsed.exp);
      this.logger.debug('parsed issuer = ' + parsed.iss);
      this.logger.debug('parsed subject = ' + parsed.sub);
      this.logger.debug('parsed role = ' + parsed.role);
    }

    return parsed;
  }

  extractCredentials(
    request: Request,
  ): TokenActorAuthenticationStrategyCredentials | null {
    if (!request.headers.authorization) {
      return null;
    }

    // for example : Bearer AAA.BBB.CCC
    const authHeaderValue = request.headers.authorization;

    if (!authHeaderValue.startsWith('Bearer')) {
      throw new HttpErrors.Unauthorized(
        `Malformed or unsupported authentication header.`,
      );
    }

    const parts = authHeaderValue.split(' ');
    if (parts.length !== 2)
      throw new HttpErrors.Unauthorized(
        `Malformed or unsupported authentication header.`,
      );
    const providedToken = parts[1];

    const tokenParts = providedToken.split('.');

    if (
      tokenParts.length !== 3 ||
      tokenParts[0].length < 1 ||
      tokenParts[1].length < 1 ||
      tokenParts[2].length < 1
    ) {
      throw new HttpErrors.Unauthorized(
        `Malformed or unsupported authentication header.`,
      );
    }

    return {
      token: providedToken,
    };
  }

  private toPayload(
    raw: string | jwt.JwtPayload,
  ): SignedAuthenticationTokenPayload {
    if (typeof raw === 'string' || !raw.sub?.length) {
      throw new HttpErrors.Unauthorized(`Token verification failed`);
    }

    const claim = (key: string): string | undefined => {
      const value: unknown = raw[key];
      return typeof value === 'string' ? value : undefined;
    };

    return {
      iat: raw.iat,
      iss: raw.iss,
      sub: raw.sub,
      jti: raw.jti,
      exp: raw.exp,
      name: claim('name'),
      // eslint-disable-next-line @typescript-eslint/naming-convention
      preferred_username: claim('preferred_username'),
      role: claim('role'),
    };
  }
}
