import type { z } from "zod";

/** Outcome of one completed request with a 2xx status. */
export interface Result {
  readonly statusCode: number;
  readonly message: string;
  readonly data: unknown;
}

export interface Collection<T> {
  data: T[];
  next_token: string | null;
}

export type DatumSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/** A `usercollection` resource that supports the date-range / token fetch. */
export interface SummaryResource<T> {
  readonly name: string;
  readonly datum: DatumSchema<T>;
}

export interface SummaryQuery {
  /** YYYY-MM-DD. Defaults to the day before `end`. */
  start?: string;
  /** YYYY-MM-DD. Defaults to today. */
  end?: string;
  /** Fetches one record by token; `start` and `end` are then ignored. */
  nextToken?: string;
}

export type SummaryResult<T> =
  | { kind: "collection"; data: T[]; nextToken: string | null }
  | { kind: "datum"; datum: T };
