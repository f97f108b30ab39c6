import { NOT_FOUND_ERROR_TYPE } from "./constants";

/**
 * Custom error types for graphgate
 */

export interface GraphQLErrorLocation {
  line: number;
  column: number;
}

/**
 * One entry of a GraphQL response's `errors` list
 */
export interface GraphQLErrorEntry {
  message: string;
  /** Server-assigned category, e.g. NOT_FOUND */
  type?: string;
  path: Array<string | number>;
  locations: GraphQLErrorLocation[];
}

/**
 * Error thrown when a query document cannot be parsed or carries a malformed page limit.
 * Raised before any network activity.
 */
export class ParseError extends Error {
  constructor(message = "Query document could not be parsed", options?: ErrorOptions) {
    super(message, options);
    this.name = "ParseError";
  }
}

/**
 * Error thrown when the HTTP exchange itself failed
 */
export class TransportError extends Error {
  public status?: number;
  public body?: string;

  constructor({ message, status, body, cause }: { message: string; status?: number; body?: string; cause?: unknown }) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TransportError";
    this.status = status;
    this.body = body;
  }
}

/**
 * Error thrown when a blocking step was aborted
 */
export class CancelledError extends Error {
  public timedOut: boolean;

  constructor(message = "Operation cancelled", { timedOut = false, cause }: { timedOut?: boolean; cause?: unknown } = {}) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "CancelledError";
    this.timedOut = timedOut;
  }
}

/**
 * Error thrown when a cost can never fit in the local budget
 */
export class RateBudgetError extends Error {
  public cost: number;
  public capacity: number;

  constructor(cost: number, capacity: number) {
    super(`Query cost ${cost} exceeds rate budget capacity ${capacity}`);
    this.name = "RateBudgetError";
    this.cost = cost;
    this.capacity = capacity;
  }
}

const generateErrorMessage = (errors: GraphQLErrorEntry[]) => {
  let message = "";

  for (let i = 0; i < errors.length; i++) {
    message += `[GraphQL] ${errors[i].message}\n`;
  }

  return message.trim();
};

/**
 * OperationError - server-reported GraphQL errors.
 * May accompany successfully decoded data (partial success).
 */
export class OperationError extends Error {
  public errors: GraphQLErrorEntry[];

  constructor(errors: GraphQLErrorEntry[]) {
    super(generateErrorMessage(errors));
    this.name = "OperationError";
    this.errors = errors;
  }

  /** Entries reporting a missing resource */
  notFound(): GraphQLErrorEntry[] {
    return this.errors.filter((entry) => entry.type === NOT_FOUND_ERROR_TYPE);
  }

  /** True when every entry is a per-item miss, i.e. a batch lookup can carry on */
  hasOnlyNotFound(): boolean {
    return this.errors.length > 0 && this.errors.every((entry) => entry.type === NOT_FOUND_ERROR_TYPE);
  }

  toString() {
    return this.message;
  }
}

/**
 * DecodeError - payload did not match the expected shape.
 * Carries a window of the payload around the failing offset when one is known.
 */
export class DecodeError extends Error {
  public offset?: number;
  public before?: string;
  public after?: string;
  public operationError?: OperationError;

  constructor({
    message,
    offset,
    before,
    after,
    cause,
  }: {
    message: string;
    offset?: number;
    before?: string;
    after?: string;
    cause?: unknown;
  }) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "DecodeError";
    this.offset = offset;
    this.before = before;
    this.after = after;
  }
}
