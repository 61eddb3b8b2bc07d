import {HttpErrors} from '@loopback/rest';

export enum AccessErrorCode {
  NOT_FOUND = 'NOT_FOUND',
  INVALID_STATE = 'INVALID_STATE',
  CONFLICT = 'CONFLICT',
  FORBIDDEN = 'FORBIDDEN',
  RESOURCE_BUSY = 'RESOURCE_BUSY',
}

/**
 * Domain failures as HTTP errors. Each carries a machine-readable `code`
 * that the REST error writer includes in the response body.
 */
export abstract class AccessErrors {
  public static notFound(message: string): HttpErrors.HttpError {
    return Object.assign(new HttpErrors.NotFound(message), {
      code: AccessErrorCode.NOT_FOUND,
    });
  }

  public static invalidState(message: string): HttpErrors.HttpError {
    return Object.assign(new HttpErrors.BadRequest(message), {
      code: AccessErrorCode.INVALID_STATE,
    });
  }

  public static conflict(message: string): HttpErrors.HttpError {
    return Object.assign(new HttpErrors.Conflict(message), {
      code: AccessErrorCode.CONFLICT,
    });
  }

  public static forbidden(message: string): HttpErrors.HttpError {
    return Object.assign(new HttpErrors.Forbidden(message), {
      code: AccessErrorCode.FORBIDDEN,
    });
  }

  /**
   * The resource is held by another request. Unlike `conflict`, retrying
   * later can succeed.
   */
  public static busy(message: string): HttpErrors.HttpError {
    return Object.assign(new HttpErrors.Conflict(message), {
      code: AccessErrorCode.RESOURCE_BUSY,
    });
  }

  /**
   * True for a unique index violation reported by the MySQL connector.
   */
  public static isDuplicateEntry(err: unknown): boolean {
    return (
      typeof err === 'object' &&
      err !== null &&
      'code' in err &&
      err.code === 'ER_DUP_ENTRY'
    );
  }

  public static concurrentModification(
    entity: string,
    id: number | undefined,
  ): HttpErrors.HttpError {
    return AccessErrors.conflict(`${entity} ${id} was modified concurrently`);
  }
}
