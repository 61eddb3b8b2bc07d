import * as jwt from 'jsonwebtoken';

import {securityId} from '@loopback/security';

import {Security} from '../../security/security-constants';
import {ActorProfile} from '../../services';
import {testConfig} from './test-helper';

export interface TestPrincipal {
  profile: ActorProfile;
  token: string;
  authHeaderName: string;
  authHeaderValue: string;
  wrongAuthHeaderValue: string;
}

export function givenActor(
  id = 1,
  role: Security.Role = Security.Role.SECURITY,
): ActorProfile {
  return {
    [securityId]: String(id),
    id,
    username: 'actor' + id,
    fullName: 'Test Actor ' + id,
    role,
    authenticationMethod: Security.AuthenticationMethod.TOKEN,
  };
}

export function givenPrincipal(
  id = 1,
  role: Security.Role = Security.Role.SECURITY,
): TestPrincipal {
  const profile = givenActor(id, role);

  const tokenPayload = {
    name: profile.fullName,
    // eslint-disable-next-line @typescript-eslint/naming-convention
    preferred_username: profile.username,
    role: profile.role,
  };

  const token = jwt.sign(tokenPayload, testConfig.security.tokenSecret, {
    subject: String(profile.id),
    issuer: testConfig.security.tokenIssuer,
    audience: testConfig.security.tokenAudience,
  });

  const wrongToken = jwt.sign(
    tokenPayload,
    testConfig.security.tokenSecret + 'aef0',
    {
      subject: String(profile.id),
      issuer: testConfig.security.tokenIssuer,
      audience: testConfig.security.tokenAudience,
    },
  );

  return {
    profile,
    token,
    authHeaderName: 'Authorization',
    authHeaderValue: 'Bearer ' + token,
    wrongAuthHeaderValue: 'Bearer ' + wrongToken,
  };
}
