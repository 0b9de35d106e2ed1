import { ValidationError } from './errors.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export interface PaginatedList<T> {
  items: T[];
  pageNumber: number;
  pageSize: number;
  totalCount: number;
  totalPages: number;
  hasPreviousPage: boolean;
  hasNextPage: boolean;
}

export function validatePage(pageNumber: number, pageSize: number): void {
  if (!Number.isInteger(pageNumber) || pageNumber < 1) {
    throw new ValidationError('Page number must be at least 1', 'page');
  }
  if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
    throw new ValidationError(`Page size must be between 1 and ${MAX_PAGE_SIZE}`, 'pageSize');
  }
}

export function pageOffset(pageNumber: number, pageSize: number): number {
  return (pageNumber - 1) * pageSize;
}

export function toPaginatedList<T>(
  items: T[],
  totalCount: number,
  pageNumber: number,
  pageSize: number
): PaginatedList<T> {
  const totalPages = Math.ceil(totalCount / pageSize);
  return {
    items,
    pageNumber,
    pageSize,
    totalCount,
    totalPages,
    hasPreviousPage: pageNumber > 1,
    hasNextPage: pageNumber < totalPages,
  };
}
