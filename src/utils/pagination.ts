export interface Paginated<T> {
  items: T[];
  page: number;
  limit: number;
  totalItems: number;
  totalPages: number;
}

export const pageOffset = (page: number, limit: number): number => (page - 1) * limit;

export const buildPage = <T>(items: T[], page: number, limit: number, totalItems: number): Paginated<T> => ({
  items,
  page,
  limit,
  totalItems,
  totalPages: Math.max(1, Math.ceil(totalItems / limit))
});
