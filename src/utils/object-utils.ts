import {HttpErrors} from '@loopback/rest';

export abstract class ObjectUtils {
  public static isDefined<T>(raw: T | null | undefined): raw is T {
    return raw !== null && raw !== undefined;
  }

  public static isNull(v: unknown): boolean {
    return (
      v === null ||
      typeof v === 'undefined' ||
      Number.isNaN(v) ||
      (typeof v === 'string' && v.trim().length < 1)
    );
  }

  public static notNull(...values: unknown[]): void {
    for (const v of values) {
      if (ObjectUtils.isNull(v)) {
        throw Error('A not-null value is required');
      }
    }
  }

  public static require<X, K extends keyof X>(
    obj: X,
    key: K,
  ): NonNullable<X[K]> {
    const v = obj[key];
    if (v === null || v === undefined || ObjectUtils.isNull(v)) {
      throw new HttpErrors.InternalServerError(
        'Field ' + String(key) + ' is required',
      );
    }
    return v;
  }
}
