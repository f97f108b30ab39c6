import { describe, it, expect } from "vitest";
import {
  CancelledError,
  DecodeError,
  OperationError,
  ParseError,
  RateBudgetError,
  TransportError,
  type GraphQLErrorEntry,
} from "@/src/core/errors";

const notFound: GraphQLErrorEntry = {
  message: "Could not resolve to a Repository with the name 'acme/missing'.",
  type: "NOT_FOUND",
  path: ["repo1"],
  locations: [{ line: 3, column: 7 }],
};

const forbidden: GraphQLErrorEntry = {
  message: "Resource not accessible by integration",
  type: "FORBIDDEN",
  path: ["repo2"],
  locations: [],
};

describe("Error Classes", () => {
  describe("ParseError", () => {
    it("creates error with default message", () => {
      const error = new ParseError();

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ParseError);
      expect(error.name).toBe("ParseError");
      expect(error.message).toBe("Query document could not be parsed");
    });

    it("keeps the cause", () => {
      const cause = new Error("Syntax Error");
      const error = new ParseError("Parsing query: Syntax Error", { cause });

      expect(error.cause).toBe(cause);
    });

    it("has stack trace", () => {
      const error = new ParseError();
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain("ParseError");
    });
  });

  describe("TransportError", () => {
    it("carries status and body", () => {
      const error = new TransportError({ message: "Unexpected HTTP status 502", status: 502, body: "<html>" });

      expect(error.name).toBe("TransportError");
      expect(error.status).toBe(502);
      expect(error.body).toBe("<html>");
      expect(error.cause).toBeUndefined();
    });
  });

  describe("CancelledError", () => {
    it("is not a timeout by default", () => {
      const error = new CancelledError();

      expect(error.name).toBe("CancelledError");
      expect(error.message).toBe("Operation cancelled");
      expect(error.timedOut).toBe(false);
    });
  });

  describe("RateBudgetError", () => {
    it("describes cost and capacity", () => {
      const error = new RateBudgetError(600, 500);

      expect(error.name).toBe("RateBudgetError");
      expect(error.message).toBe("Query cost 600 exceeds rate budget capacity 500");
      expect(error.cost).toBe(600);
      expect(error.capacity).toBe(500);
    });
  });

  describe("OperationError", () => {
    it("lists every GraphQL error in order", () => {
      const error = new OperationError([notFound, forbidden]);

      expect(error.name).toBe("OperationError");
      expect(error.message).toBe(
        "[GraphQL] Could not resolve to a Repository with the name 'acme/missing'.\n[GraphQL] Resource not accessible by integration",
      );
      expect(error.toString()).toBe(error.message);
      expect(error.errors).toEqual([notFound, forbidden]);
    });

    it("separates per-item misses", () => {
      const mixed = new OperationError([notFound, forbidden]);
      const misses = new OperationError([notFound, { ...notFound, path: ["repo3"] }]);

      expect(mixed.notFound()).toEqual([notFound]);
      expect(mixed.hasOnlyNotFound()).toBe(false);
      expect(misses.hasOnlyNotFound()).toBe(true);
    });
  });

  describe("DecodeError", () => {
    it("carries the payload window", () => {
      const error = new DecodeError({ message: "cannot decode", offset: 4, before: "abcd", after: "efgh" });

      expect(error.name).toBe("DecodeError");
      expect(error.offset).toBe(4);
      expect(error.before).toBe("abcd");
      expect(error.after).toBe("efgh");
      expect(error.operationError).toBeUndefined();
    });
  });

  describe("Error differentiation", () => {
    it("can be used in error handling patterns", () => {
      const errors = [
        new ParseError(),
        new TransportError({ message: "boom" }),
        new OperationError([notFound]),
        new CancelledError(),
        new Error("Generic error"),
      ];

      expect(errors.filter((e) => e instanceof ParseError)).toHaveLength(1);
      expect(errors.filter((e) => e instanceof TransportError)).toHaveLength(1);
      expect(errors.filter((e) => e instanceof OperationError)).toHaveLength(1);
      expect(errors.filter((e) => e instanceof CancelledError)).toHaveLength(1);
    });
  });

  describe("Public API exports", () => {
    it("exported errors are the same classes as core errors", async () => {
      const exported = await import("@/src");

      expect(exported.ParseError).toBe(ParseError);
      expect(exported.TransportError).toBe(TransportError);
      expect(exported.OperationError).toBe(OperationError);
      expect(exported.DecodeError).toBe(DecodeError);
      expect(exported.CancelledError).toBe(CancelledError);
      expect(exported.RateBudgetError).toBe(RateBudgetError);
    });
  });
});
