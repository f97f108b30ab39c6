import { describe, it, expect } from "vitest";
import { z } from "zod";
import { createGraphgate } from "@/src/core/client";
import { createBearerAuthenticator } from "@/src/core/auth";
import { createVersionCache } from "@/src/core/versions";
import type { GraphgateOptions } from "@/src/core/types";
import { createRateRegistry } from "@/src/ratelimit/registry";
import { createTestLogger, createTransportStub, jsonResponse, queries, rateHeaders } from "@/test/helpers";

const GHE = "https://ghe.example.com/api/v3";

const ViewerShape = z.object({ viewer: z.object({ login: z.string() }) });

const viewerResponse = () => jsonResponse({ data: { viewer: { login: "octocat" } } });

const setup = (options: Partial<GraphgateOptions> & Pick<GraphgateOptions, "apiUrl">) => {
  const logger = createTestLogger();
  const rateRegistry = createRateRegistry({ budget: { capacity: 100, refillPerSecond: 1, now: () => 0 } });
  const client = createGraphgate({ logger, rateRegistry, ...options });

  return { client, logger, rateRegistry };
};

describe("createGraphgate", () => {
  describe("options", () => {
    it("rejects a relative or empty apiUrl", () => {
      expect(() => createGraphgate({ apiUrl: "/api/v3" })).toThrow("'apiUrl' must be an absolute URL, got '/api/v3'");
      expect(() => createGraphgate({ apiUrl: "" })).toThrow("'apiUrl' must be an absolute URL, got ''");
    });

    it("canonicalises the API URL", () => {
      expect(setup({ apiUrl: "https://github.com/" }).client.apiUrl.href).toBe("https://api.github.com/");
      expect(setup({ apiUrl: new URL(`${GHE}/`) }).client.apiUrl.href).toBe(GHE);
    });
  });

  describe("execute", () => {
    it("sends to the deployment's GraphQL endpoint", async () => {
      const transport = createTransportStub(viewerResponse());
      const { client } = setup({ apiUrl: GHE, transport });

      const { data } = await client.execute({ query: queries.VIEWER, schema: ViewerShape });

      expect(data).toEqual({ viewer: { login: "octocat" } });
      expect(transport.requests[0].url).toBe("https://ghe.example.com/api/graphql");
    });

    it("authenticates requests", async () => {
      const transport = createTransportStub(viewerResponse());
      const { client } = setup({ apiUrl: GHE, transport, authenticator: createBearerAuthenticator("test-secret") });

      await client.execute({ query: queries.VIEWER, schema: ViewerShape });

      expect(transport.requests[0].headers.Authorization).toBe("Bearer test-secret");
    });

    it("sends anonymous requests without credentials", async () => {
      const transport = createTransportStub(viewerResponse());
      const { client } = setup({ apiUrl: GHE, transport });

      await client.execute({ query: queries.VIEWER, schema: ViewerShape });

      expect(transport.requests[0].headers).not.toHaveProperty("Authorization");
    });

    it("tracks the server-reported rate status", async () => {
      const reset = Math.floor(Date.now() / 1000) + 3600;
      const transport = createTransportStub(
        jsonResponse({ data: { viewer: { login: "octocat" } } }, { headers: rateHeaders({ limit: 5000, remaining: 4999, reset }) }),
      );
      const { client } = setup({ apiUrl: GHE, transport });

      expect(client.rateStatus().known).toBe(false);

      await client.execute({ query: queries.VIEWER, schema: ViewerShape });

      expect(client.rateStatus()).toMatchObject({ known: true, limit: 5000, remaining: 4999, resetAt: reset * 1000 });
    });
  });

  describe("shared rate resources", () => {
    it("shares one budget between clients of the same endpoint and credential", async () => {
      const transport = createTransportStub(jsonResponse({ data: {} }));
      const { client, logger, rateRegistry } = setup({
        apiUrl: GHE,
        transport,
        authenticator: createBearerAuthenticator("test-secret"),
      });
      const sibling = createGraphgate({
        apiUrl: `${GHE}/`,
        transport,
        logger,
        rateRegistry,
        authenticator: createBearerAuthenticator("test-secret"),
      });

      await client.execute({ query: queries.NESTED_LIMITS, schema: z.unknown() });

      expect(client.availableBudget()).toBe(49);
      expect(sibling.availableBudget()).toBe(49);
    });

    it("gives another credential its own budget", async () => {
      const transport = createTransportStub(jsonResponse({ data: {} }));
      const { client } = setup({ apiUrl: GHE, transport, authenticator: createBearerAuthenticator("test-secret") });
      const other = client.withAuthenticator(createBearerAuthenticator("other-secret"));

      await client.execute({ query: queries.NESTED_LIMITS, schema: z.unknown() });

      expect(other.apiUrl.href).toBe(GHE);
      expect(other.availableBudget()).toBe(100);
    });
  });

  describe("server version", () => {
    it("fetches the installed version from the metadata endpoint", async () => {
      const transport = createTransportStub(jsonResponse({ installed_version: "3.9.2" }));
      const { client } = setup({ apiUrl: GHE, transport });

      const version = await client.getVersion();

      expect(version.version).toBe("3.9.2");
      expect(transport.requests).toEqual([
        { method: "GET", url: "https://ghe.example.com/api/v3/meta", headers: { Accept: "application/json" } },
      ]);
    });

    it("checks version ranges against the cached version", async () => {
      const transport = createTransportStub(jsonResponse({ installed_version: "3.9.2" }));
      const { client } = setup({ apiUrl: GHE, transport });

      expect(await client.supports(">=3.4")).toBe(true);
      expect(await client.supports("<3.0")).toBe(false);
      expect(transport).toHaveBeenCalledTimes(1);
    });

    it("treats the public deployment as supporting everything", async () => {
      const transport = createTransportStub(viewerResponse());
      const { client } = setup({ apiUrl: "https://api.github.com", transport });

      expect((await client.getVersion()).version).toBe("99.99.99");
      expect(await client.supports(">=3.4")).toBe(true);
      expect(transport).not.toHaveBeenCalled();
    });

    it("falls back to the all-matching version when the metadata request fails", async () => {
      const transport = createTransportStub(jsonResponse({ message: "Not Found" }, { status: 404 }));
      const { client, logger } = setup({ apiUrl: GHE, transport });

      const version = await client.getVersion();

      expect(version.version).toBe("99.99.99");
      expect(logger.warn).toHaveBeenCalledWith(
        "Failed to fetch server version",
        expect.objectContaining({ apiUrl: "https://ghe.example.com/api/v3" }),
      );
    });

    it("keeps the version cache across credentials", async () => {
      const transport = createTransportStub(jsonResponse({ installed_version: "3.9.2" }));
      const { client } = setup({ apiUrl: GHE, transport, authenticator: createBearerAuthenticator("test-secret") });
      const other = client.withAuthenticator(createBearerAuthenticator("other-secret"));

      await client.getVersion();
      await other.getVersion();

      expect(transport).toHaveBeenCalledTimes(1);
    });

    it("uses an injected version cache", async () => {
      const transport = createTransportStub(jsonResponse({ installed_version: "3.9.2" }));
      const versionCache = createVersionCache({ logger: createTestLogger() });
      const first = setup({ apiUrl: GHE, transport, versionCache }).client;
      const second = setup({ apiUrl: GHE, transport, versionCache }).client;

      await first.getVersion();
      await second.getVersion();

      expect(transport).toHaveBeenCalledTimes(1);
      expect(versionCache.size()).toBe(1);
    });
  });
});
