import {
  Kind,
  parse,
  GraphQLError,
  type DocumentNode,
  type SelectionSetNode,
  type ArgumentNode,
  type ValueNode,
} from "graphql";
import { ParseError } from "../core/errors";
import { PAGINATION_LIMIT_ARGS, COST_SCALE, MIN_COST } from "./constants";

/**
 * A page limit seen on the path from the definition root to the current field
 */
export interface LimitEntry {
  limit: number;
  depth: number;
}

/**
 * Mutable state for one definition's traversal
 */
export interface CostContext {
  cost: number;
  limits: LimitEntry[];
}

const toDocument = (document: string | DocumentNode): DocumentNode => {
  if (typeof document !== "string") {
    return document;
  }

  try {
    return parse(document);
  } catch (error) {
    if (error instanceof GraphQLError) {
      throw new ParseError(`Parsing query: ${error.message}`, { cause: error });
    }

    throw error;
  }
};

/**
 * Read a page limit out of an argument value.
 * Returns null for values unknown until execution (variables, null).
 */
const readLimit = (argument: ArgumentNode): number | null => {
  const value: ValueNode = argument.value;

  switch (value.kind) {
    case Kind.VARIABLE:
    case Kind.NULL:
      return null;

    case Kind.INT: {
      const limit = Number(value.value);

      if (!Number.isSafeInteger(limit)) {
        throw new ParseError(`Parsing limit: "${argument.name.value}" value ${value.value} is out of range`);
      }

      return limit;
    }

    default:
      throw new ParseError(`Parsing limit: "${argument.name.value}" must be an integer, got ${value.kind}`);
  }
};

const recordLimit = (context: CostContext, limit: number, depth: number): void => {
  // Drop limits left behind by a subtree we have already walked out of
  context.limits = context.limits.filter((entry) => entry.depth < depth);
  context.limits.push({ limit, depth });

  // First limit on a path is always worth 1
  if (context.limits.length === 1) {
    context.cost += 1;
    return;
  }

  let product = 1;

  for (let i = 0; i < context.limits.length - 1; i++) {
    product *= context.limits[i].limit;
  }

  context.cost += product;
};

const walkSelectionSet = (context: CostContext, selectionSet: SelectionSetNode, depth: number): void => {
  for (const selection of selectionSet.selections) {
    switch (selection.kind) {
      case Kind.FIELD: {
        // Limits recorded in this field's subtree end with it
        const outer = context.limits;

        for (const argument of selection.arguments ?? []) {
          if (!PAGINATION_LIMIT_ARGS.has(argument.name.value)) {
            continue;
          }

          const limit = readLimit(argument);

          if (limit !== null) {
            recordLimit(context, limit, depth);
          }
        }

        if (selection.selectionSet) {
          walkSelectionSet(context, selection.selectionSet, depth + 1);
        }

        context.limits = outer;
        break;
      }

      case Kind.INLINE_FRAGMENT:
        walkSelectionSet(context, selection.selectionSet, depth + 1);
        break;

      case Kind.FRAGMENT_SPREAD:
        // Fragment definitions are costed on their own
        break;
    }
  }
};

/**
 * Raw (unscaled) cost of every definition in the document
 */
export const rawDocumentCost = (document: DocumentNode): number => {
  let total = 0;

  for (const definition of document.definitions) {
    if (definition.kind !== Kind.OPERATION_DEFINITION && definition.kind !== Kind.FRAGMENT_DEFINITION) {
      continue;
    }

    const context: CostContext = { cost: 0, limits: [] };

    walkSelectionSet(context, definition.selectionSet, 1);
    total += context.cost;
  }

  return total;
};

/**
 * Estimate the rate limit score of a query before sending it.
 *
 * Page sizes (`first`/`last`) multiply down each nested path, distinct limited
 * paths are summed, and the total is scaled down by 100 with a floor of 1.
 *
 * @throws ParseError when the document does not parse or a limit is not an integer
 * @example
 * ```typescript
 * estimateCost(`{
 *   viewer {
 *     repositories(first: 100) {
 *       nodes { issues(first: 50) { nodes { labels(first: 20) { nodes { name } } } } }
 *     }
 *   }
 * }`); // 51
 * ```
 */
export const estimateCost = (document: string | DocumentNode): number => {
  const total = rawDocumentCost(toDocument(document));

  return Math.max(MIN_COST, Math.floor(total / COST_SCALE));
};
