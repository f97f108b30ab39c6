import { z, type ZodIssue, type ZodType, type ZodTypeDef } from "zod";
import { DECODE_WINDOW } from "./constants";
import { DecodeError, type GraphQLErrorEntry } from "./errors";
import { locateSpan } from "./offsets";
import { isObject, toBytes } from "./utils";

/**
 * Caller-supplied result shape
 *
 * @public
 * @example
 * ```typescript
 * const ViewerShape: Shape<{ viewer: { login: string } }> = z.object({
 *   viewer: z.object({ login: z.string() }),
 * });
 * ```
 */
export type Shape<T> = ZodType<T, ZodTypeDef, unknown>;

const locationSchema = z.object({
  line: z.number(),
  column: z.number(),
});

const errorEntrySchema = z.object({
  message: z.string(),
  type: z
    .string()
    .nullish()
    .transform((type) => type ?? undefined),
  path: z
    .array(z.union([z.string(), z.number()]))
    .nullish()
    .transform((path) => path ?? []),
  locations: z
    .array(locationSchema)
    .nullish()
    .transform((locations) => locations ?? []),
});

const envelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z.array(errorEntrySchema).nullish(),
});

export interface DecodedEnvelope {
  /** Server-reported errors, in response order */
  errors: GraphQLErrorEntry[];
  /** Raw bytes of `data`, or null when absent or null */
  data: Buffer | null;
}

/**
 * Slice the payload around `offset`
 */
export const describeOffset = (bytes: Buffer, offset: number): { before: string; after?: string } => {
  const start = Math.max(0, offset - DECODE_WINDOW);
  const before = bytes.toString("utf8", start, Math.min(offset, bytes.length));

  if (offset >= bytes.length) {
    return { before };
  }

  const end = Math.min(bytes.length, offset + DECODE_WINDOW);

  return { before, after: bytes.toString("utf8", offset, end) };
};

const describeIssue = (issue: ZodIssue): string => {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
};

const mismatchError = (bytes: Buffer, issue: ZodIssue): DecodeError => {
  const offset = locateSpan(bytes, issue.path).end;
  const { before, after } = describeOffset(bytes, offset);

  let message = `cannot decode at offset ${offset}: before ${JSON.stringify(before)}`;
  if (after !== undefined) {
    message += `; after ${JSON.stringify(after)}`;
  }
  message += `: ${describeIssue(issue)}`;

  return new DecodeError({ message, offset, before, after });
};

const parseJson = (bytes: Buffer): unknown => {
  try {
    return JSON.parse(bytes.toString("utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new DecodeError({ message: `invalid JSON: ${reason}`, cause: error });
  }
};

const validate = <T>(bytes: Buffer, value: unknown, schema: Shape<T>): T => {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  throw mismatchError(bytes, result.error.issues[0]);
};

/**
 * Decode a JSON payload into the given shape.
 *
 * @throws DecodeError with the payload window around the first mismatch
 */
export const decode = <T>(payload: string | Uint8Array, schema: Shape<T>): T => {
  const bytes = toBytes(payload);
  return validate(bytes, parseJson(bytes), schema);
};

/**
 * Decode the `{ data, errors }` envelope without touching `data`
 */
export const decodeEnvelope = (payload: string | Uint8Array): DecodedEnvelope => {
  const bytes = toBytes(payload);
  const envelope = validate(bytes, parseJson(bytes), envelopeSchema);

  let data: Buffer | null = null;

  if (envelope.data !== undefined && envelope.data !== null) {
    const span = locateSpan(bytes, ["data"]);
    data = bytes.subarray(span.start, span.end);
  }

  return { errors: envelope.errors ?? [], data };
};

/**
 * Whether a non-2xx body still carries a GraphQL envelope worth decoding
 */
export const isUsableEnvelope = (payload: string | Uint8Array): boolean => {
  let value: unknown;

  try {
    value = JSON.parse(toBytes(payload).toString("utf8"));
  } catch {
    return false;
  }

  if (!isObject(value)) {
    return false;
  }

  const { data, errors } = value;

  return (data !== undefined && data !== null) || (Array.isArray(errors) && errors.length > 0);
};
