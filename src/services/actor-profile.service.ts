import {injectable} from '@loopback/core';
import {HttpErrors} from '@loopback/rest';
import {securityId} from '@loopback/security';

import {
  ActorAuthenticationRequirements,
  Security,
} from '../security/security-constants';
import {SignedAuthenticationTokenPayload} from './token-actor-auth.service';

export interface ActorProfile {
  [securityId]: string;
  id: number;
  username: string;
  fullName: string;
  role: Security.Role;
  authenticationMethod?: Security.AuthenticationMethod;
}

/**
 * Actor used for changes made by the system itself, such as the
 * expiration of overdue sessions.
 */
export const SystemActor: ActorProfile = {
  [securityId]: 'system',
  id: 0,
  username: 'system',
  fullName: 'System',
  role: Security.Role.ADMINISTRATOR,
};

const ROLES: readonly Security.Role[] = Object.values(Security.Role);

@injectable()
export class ActorProfileService {
  constructor() {}

  public async profileFromToken(
    payload: SignedAuthenticationTokenPayload,
  ): Promise<ActorProfile> {
    const id = Number(payload.sub);
    if (!Number.isInteger(id) || id <= 0) {
      throw new HttpErrors.Unauthorized('Invalid token subject');
    }

    const role = ROLES.find(r => r === payload.role);
    if (!role) {
      throw new HttpErrors.Unauthorized('Invalid token role');
    }

    const username = payload.preferred_username?.length
      ? payload.preferred_username
      : payload.sub;

    const output: ActorProfile = {
      [securityId]: payload.sub,
      id,
      username,
      fullName: payload.name?.length ? payload.name : username,
      role,
      authenticationMethod: Security.AuthenticationMethod.TOKEN,
    };

    return output;
  }

  public async authorize(
    actor: ActorProfile,
    requirements: ActorAuthenticationRequirements,
  ): Promise<boolean> {
    if (requirements.required?.length) {
      if (!actor) {
        return false;
      }

      if (requirements.required.indexOf(actor.role) === -1) {
        return false;
      }
    }

    return true;
  }
}
