import {authenticate} from '@loopback/authentication';
import {inject} from '@loopback/core';
import {get, Request, ResponseObject, RestBindings} from '@loopback/rest';
import {SecurityBindings} from '@loopback/security';
import {ActorProfile} from '../services';

const OAS_CONTROLLER_NAME = 'Public';

/**
 * OpenAPI response for ping()
 */
const PING_RESPONSE: ResponseObject = {
  description: 'Ping Response',
  content: {
    'application/json': {
      schema: {
        type: 'object',
        title: 'PingResponse',
        properties: {
          pong: {type: 'string'},
          date: {type: 'string'},
          url: {type: 'string'},
          headers: {
            type: 'object',
            properties: {
              'Content-Type': {type: 'string'},
            },
            additionalProperties: true,
          },
        },
      },
    },
  },
};

/**
 * A simple controller to bounce back http requests
 */
export class PingController {
  constructor(
    @inject(RestBindings.Http.REQUEST) private req: Request,
    @inject(SecurityBindings.USER, {optional: true})
    private actor?: ActorProfile,
  ) {}

  // Map to `GET /ping`
  @get('/ping', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'ping',
    responses: {
      '200': PING_RESPONSE,
    },
  })
  ping(): object {
    return {
      pong: 'pong',
      date: new Date(),
      url: this.req.url,
    };
  }

  @get('/whoAmI', {
    'x-controller-name': OAS_CONTROLLER_NAME,
    operationId: 'whoAmI',
    responses: {
      '200': {
        description: 'WhoAmI Response',
        content: {
          'application/json': {
            schema: {
              type: 'object',
              title: 'WhoAmIResponse',
              properties: {
                id: {type: 'number'},
                username: {type: 'string'},
                fullName: {type: 'string'},
                role: {type: 'string'},
              },
            },
          },
        },
      },
    },
  })
  @authenticate({strategy: 'token'})
  whoAmI(): object {
    return {
      id: this.actor?.id,
      username: this.actor?.username,
      fullName: this.actor?.fullName,
      role: this.actor?.role,
    };
  }
}
