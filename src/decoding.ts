// ---------------------------------------------------------------------------
// Barte SDK – Decoding Contract
// ---------------------------------------------------------------------------
// Raw JSON → typed record, or a DecodingError naming the first bad field.
// Decoding is pure: the same input always yields the same record or error.
// ---------------------------------------------------------------------------

import { z } from "zod";
import { DecodingError, type DecodingIssue } from "./errors";

/** A zod schema from unknown JSON to `T`. */
export type Decoder<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const isoTimestamp = z.union([
  z.string().date(),
  z.string().datetime({ offset: true, local: true }),
]);

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/;

/** Pin a calendar date or zone-less date-time to UTC; offsets become `±hh:mm`. */
function toUtcIso(value: string): string {
  if (!value.includes("T")) return `${value}T00:00:00Z`;
  if (!ZONE_SUFFIX.test(value)) return `${value}Z`;
  return value.replace(
    /([+-]\d{2}):?(\d{2})?$/,
    (_offset, hours: string, minutes?: string) => `${hours}:${minutes ?? "00"}`,
  );
}

/**
 * ISO-8601 date or date-time string → `Date`.
 *
 * Date-only values and date-times without an offset are read as UTC.
 * Strings that are not ISO-8601, or that name an impossible date such as
 * `2025-02-30`, are rejected.
 */
export const timestamp = z.string().transform((value, ctx) => {
  if (!isoTimestamp.safeParse(value).success) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Expected an ISO-8601 timestamp, received "${value}"`,
    });
    return z.NEVER;
  }
  return new Date(toUtcIso(value));
});

/** Field that may be absent, or present with an explicit `null`. */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullable().optional();
}

/** Dotted field path, e.g. `content.0.customer.name`. */
function formatPath(path: readonly (string | number)[]): string {
  return path.map(String).join(".");
}

/** Flatten zod issues into the SDK's own issue shape. */
export function toDecodingIssues(error: z.ZodError): DecodingIssue[] {
  return error.issues.map((issue) => ({
    field: formatPath(issue.path),
    message: issue.message,
  }));
}

/**
 * Decode `raw` with `schema`.
 *
 * @param entity - Name used in the error message (e.g. `"Charge"`).
 * @throws {DecodingError} when `raw` does not match the schema.
 */
export function decode<T>(schema: Decoder<T>, raw: unknown, entity: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new DecodingError(entity, toDecodingIssues(result.error));
  }
  return result.data;
}
