export namespace Security {
  export enum Role {
    SECURITY = 'SECURITY',
    IT = 'IT',
    ADMINISTRATOR = 'ADMINISTRATOR',
  }

  export enum AuthenticationMethod {
    TOKEN = 'TOKEN',
  }
}

export interface ActorAuthenticationRequirements {
  context: string;
  /** Roles allowed on the route. Empty or missing means any authenticated actor. */
  required?: Security.Role[];
}

export interface TokenActorAuthenticationStrategyCredentials {
  token: string;
}
