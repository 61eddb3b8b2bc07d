import {HttpErrors} from '@loopback/rest';

const MAX_IDENTIFIER_LENGTH = 255;
const MAX_NOTE_LENGTH = 2000;

export abstract class SanitizationUtils {
  public static sanitizeIdentifier(raw: string | undefined): string {
    const trimmed = raw?.trim();
    if (!trimmed) {
      throw new HttpErrors.BadRequest('An equipment identifier is required');
    }
    if (trimmed.length > MAX_IDENTIFIER_LENGTH) {
      throw new HttpErrors.BadRequest('Invalid equipment identifier');
    }
    return trimmed;
  }

  public static sanitizeOptionalCode(
    raw: string | null | undefined,
  ): string | undefined {
    const trimmed = raw?.trim();
    if (!trimmed) {
      return undefined;
    }
    if (trimmed.length > MAX_IDENTIFIER_LENGTH) {
      throw new HttpErrors.BadRequest('Invalid code');
    }
    return trimmed;
  }

  public static sanitizeNote(raw: string | null | undefined): string | undefined {
    const trimmed = raw?.trim();
    if (!trimmed) {
      return undefined;
    }
    if (trimmed.length > MAX_NOTE_LENGTH) {
      throw new HttpErrors.BadRequest(
        `Notes cannot exceed ${MAX_NOTE_LENGTH} characters`,
      );
    }
    return trimmed;
  }

  public static sanitizeEnum<T extends string>(
    values: readonly T[],
    raw: string | undefined,
    field: string,
  ): T {
    const match = values.find(v => v === raw);
    if (!match) {
      throw new HttpErrors.BadRequest(
        `Invalid ${field}, expected one of ${values.join(', ')}`,
      );
    }
    return match;
  }

  public static sanitizeDateRange(start: Date, end: Date): void {
    if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
      throw new HttpErrors.BadRequest('Invalid date');
    }
    if (start.getTime() > end.getTime()) {
      throw new HttpErrors.BadRequest('Start date must be before end date');
    }
  }
}
