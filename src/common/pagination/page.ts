import { z } from 'zod';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
/** Keeps `page * size` a safe OFFSET. */
export const MAX_PAGE = 10_000;

export type PageRequest = {
  /** 0-based page index. */
  page: number;
  size: number;
};

export type Page<T> = {
  content: T[];
  page: number;
  size: number;
  totalElements: number;
  totalPages: number;
};

export const pageRequestSchema = z.object({
  page: z.coerce.number().int().min(0).max(MAX_PAGE).optional(),
  size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
});

export function toPageRequest(input: { page?: number; size?: number }): PageRequest {
  const page = Math.max(0, Math.min(MAX_PAGE, Math.floor(input.page ?? 0)));
  const size = Math.max(1, Math.min(MAX_PAGE_SIZE, Math.floor(input.size ?? DEFAULT_PAGE_SIZE)));
  return { page, size };
}

export function pageOffset(req: PageRequest): number {
  return req.page * req.size;
}

export function toPage<T>(content: T[], req: PageRequest, totalElements: number): Page<T> {
  const total = Math.max(0, Math.floor(totalElements));
  return {
    content,
    page: req.page,
    size: req.size,
    totalElements: total,
    totalPages: total === 0 ? 0 : Math.ceil(total / req.size),
  };
}

export function emptyPage<T>(req: PageRequest): Page<T> {
  return toPage<T>([], req, 0);
}

export function mapPage<T, U>(page: Page<T>, fn: (item: T) => U): Page<U> {
  return { ...page, content: page.content.map(fn) };
}
