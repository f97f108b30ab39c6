import { SemVer, coerce, parse } from "semver";
import { ALL_MATCHING_VERSION, VERSION_CACHE_RESET_INTERVAL } from "./constants";
import { endpointKey, isPublicEndpoint } from "./endpoints";
import { consoleLogger, type Logger } from "./instrumentation";
import { createMutex } from "./utils";

/**
 * Configuration options for the version cache
 */
export type VersionCacheOptions = {
  /** Whole-cache reset interval in ms (default: 6 hours) */
  resetInterval?: number;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
  logger?: Logger;
};

/**
 * Fetches the raw `installed_version` string of a self-hosted deployment
 */
export type InstalledVersionFetcher = () => Promise<string>;

export type VersionCacheInstance = ReturnType<typeof createVersionCache>;

const allMatching = (): SemVer => new SemVer(ALL_MATCHING_VERSION);

const SHORT_VERSION = /^v?\d+(\.\d+){0,2}$/;

/**
 * Parse an installed version. Accepts short forms such as "3.4".
 */
export const parseInstalledVersion = (raw: string): SemVer | null => {
  const trimmed = raw.trim();
  const parsed = parse(trimmed, { loose: true });

  if (parsed) {
    return parsed;
  }

  return SHORT_VERSION.test(trimmed) ? coerce(trimmed) : null;
};

/**
 * Server versions per endpoint, for deciding which optional fields to request.
 *
 * All entries share one lock and are dropped together once `resetInterval`
 * has passed since the last reset. The lock stays held while a missing
 * version is fetched, so concurrent lookups for every endpoint queue behind it.
 */
export const createVersionCache = ({
  resetInterval = VERSION_CACHE_RESET_INTERVAL,
  now = () => Date.now(),
  logger = consoleLogger,
}: VersionCacheOptions = {}) => {
  const lock = createMutex();

  let versions = new Map<string, SemVer>();
  let lastReset: number | null = null;

  const fetchVersion = async (apiUrl: URL, fetchInstalledVersion: InstalledVersionFetcher): Promise<SemVer> => {
    let raw: string;

    try {
      raw = await fetchInstalledVersion();
    } catch (error) {
      logger.warn("Failed to fetch server version", { apiUrl: apiUrl.href, error });
      return allMatching();
    }

    const version = parseInstalledVersion(raw);

    if (!version) {
      logger.warn("Failed to parse server version", { apiUrl: apiUrl.href, installedVersion: raw });
      return allMatching();
    }

    return version;
  };

  /**
   * Version of the deployment behind `apiUrl`. Never rejects: failures degrade
   * to a version that satisfies every feature range.
   */
  const getVersion = (apiUrl: URL, fetchInstalledVersion: InstalledVersionFetcher): Promise<SemVer> => {
    if (isPublicEndpoint(apiUrl)) {
      return Promise.resolve(allMatching());
    }

    return lock.runExclusive(async () => {
      const t = now();

      if (lastReset === null || t - lastReset > resetInterval) {
        lastReset = t;
        versions = new Map();
      }

      const key = endpointKey(apiUrl);
      const cached = versions.get(key);

      if (cached) {
        return cached;
      }

      const version = await fetchVersion(apiUrl, fetchInstalledVersion);

      versions.set(key, version);

      return version;
    });
  };

  const clear = (): Promise<void> => {
    return lock.runExclusive(async () => {
      versions = new Map();
      lastReset = null;
    });
  };

  const size = (): number => versions.size;

  return {
    getVersion,
    clear,
    size,
  };
};
