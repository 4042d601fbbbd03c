// backend/services/shared/http/pagination.ts
export type ListPage<T> = {
  total: number;
  limit: number;
  offset: number;
  items: T[];
};

export function makeList<T>(
  items: T[],
  limit: number,
  offset: number,
  total: number
): ListPage<T> {
  return { total, limit, offset, items };
}
