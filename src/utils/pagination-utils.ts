import {HttpErrors} from '@loopback/rest';
import {Page, Pageable} from '../models';

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 500;

export abstract class PaginationUtils {
  public static parsePagination(
    skip: number | undefined,
    limit: number | undefined,
  ): Required<Pageable> {
    const effectiveSkip = skip ?? 0;
    const effectiveLimit = limit ?? DEFAULT_PAGE_LIMIT;

    if (!Number.isInteger(effectiveSkip) || effectiveSkip < 0) {
      throw new HttpErrors.BadRequest('Bad skip value');
    }
    if (
      !Number.isInteger(effectiveLimit) ||
      effectiveLimit < 1 ||
      effectiveLimit > MAX_PAGE_LIMIT
    ) {
      throw new HttpErrors.BadRequest(
        `Bad limit value, must be between 1 and ${MAX_PAGE_LIMIT}`,
      );
    }

    return {
      skip: effectiveSkip,
      limit: effectiveLimit,
    };
  }

  public static emptyPage<T>(pageable?: Pageable): Page<T> {
    return {
      content: [],
      numberOfElements: 0,
      totalElements: 0,
      skip: pageable?.skip ?? 0,
      limit: pageable?.limit ?? DEFAULT_PAGE_LIMIT,
      hasContent: false,
      hasNext: false,
    };
  }
}
