// ---------------------------------------------------------------------------
// Barte SDK – Paginated list wrapper
// ---------------------------------------------------------------------------
// List endpoints answer with a Spring-style page. Page number and size are
// read from top-level `pageNumber`/`pageSize`, else from `pageable`, else
// from `number`/`size`. A page decodes whole or not at all.
// ---------------------------------------------------------------------------

import { z } from "zod";
import type { Decoder } from "../decoding";

export interface SortInfo {
  readonly sorted: boolean;
  readonly unsorted: boolean;
  readonly empty: boolean;
}

export interface Page<T> {
  readonly content: readonly T[];
  /** Zero-based page index. */
  readonly pageNumber: number;
  readonly pageSize: number;
  readonly totalElements: number;
  readonly totalPages: number;
  /** Elements on this page. */
  readonly numberOfElements: number;
  readonly first: boolean;
  readonly last: boolean;
  readonly empty: boolean;
  readonly sort: SortInfo;
}

const sortSchema = z.object({
  sorted: z.boolean(),
  unsorted: z.boolean(),
  empty: z.boolean(),
});

const pageableSchema = z.object({
  pageNumber: z.number().int(),
  pageSize: z.number().int(),
});

const pageEnvelopeSchema = z.object({
  content: z.array(z.unknown()),
  pageNumber: z.number().int().optional(),
  pageSize: z.number().int().optional(),
  // Spring sends the string "INSTANCE" for unpaged results.
  pageable: z.union([pageableSchema, z.string()]).optional(),
  number: z.number().int().optional(),
  size: z.number().int().optional(),
  totalElements: z.number().int(),
  totalPages: z.number().int(),
  numberOfElements: z.number().int().optional(),
  first: z.boolean(),
  last: z.boolean(),
  empty: z.boolean(),
  sort: sortSchema,
});

/** Build the decoder for a page whose elements decode with `item`. */
export function pageOf<T>(item: Decoder<T>): Decoder<Page<T>> {
  return pageEnvelopeSchema.transform((page, ctx): Page<T> => {
    const pageable = typeof page.pageable === "object" ? page.pageable : undefined;
    const pageNumber = page.pageNumber ?? pageable?.pageNumber ?? page.number;
    const pageSize = page.pageSize ?? pageable?.pageSize ?? page.size;

    if (pageNumber === undefined || pageSize === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [pageNumber === undefined ? "pageNumber" : "pageSize"],
        message: "Required",
      });
      return z.NEVER;
    }

    const content: T[] = [];
    for (const [index, raw] of page.content.entries()) {
      const decoded = item.safeParse(raw);
      if (!decoded.success) {
        for (const issue of decoded.error.issues) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["content", index, ...issue.path],
            message: issue.message,
          });
        }
        return z.NEVER;
      }
      content.push(decoded.data);
    }

    return {
      content,
      pageNumber,
      pageSize,
      totalElements: page.totalElements,
      totalPages: page.totalPages,
      numberOfElements: page.numberOfElements ?? content.length,
      first: page.first,
      last: page.last,
      empty: page.empty,
      sort: page.sort,
    };
  });
}
