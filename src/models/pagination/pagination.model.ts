export interface Page<T> {
  content: T[];
  numberOfElements: number;
  totalElements: number;
  skip: number;
  limit: number;
  hasContent: boolean;
  hasNext: boolean;
}

export interface Pageable {
  skip?: number;
  limit?: number;
}
