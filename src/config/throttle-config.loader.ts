import { ConfigurationError } from "@/common/errors/throttling.errors";
import { isHttpMethod, type FilterSpec, type ThrottleOptions } from "@/throttling/interfaces/throttling.interfaces";
import { ENV } from "./environment.constants";

const REGEXP_PREFIX = "re:";

export type ThrottlingEnv = typeof ENV.THROTTLING;

/**
 * Parse filter entries of the form `[METHOD ]pattern`, where a pattern
 * starting with `re:` is compiled as a regular expression.
 *
 * @example
 * parseFilterList(["GET https://itunes.apple.com/", "re:https://[a-z]+\\.last\\.fm/"]);
 */
export function parseFilterList(entries: readonly string[]): FilterSpec[] {
  return entries
    .map(entry => entry.trim())
    .filter(Boolean)
    .map(entry => {
      const separator = entry.search(/\s/);
      if (separator < 0) {
        return parsePattern(entry);
      }

      const method = entry.slice(0, separator);
      if (!isHttpMethod(method)) {
        throw new ConfigurationError(`Invalid HTTP method in filter "${entry}": ${method}`, { entry });
      }
      return [method, parsePattern(entry.slice(separator).trim())] as const;
    });
}

function parsePattern(raw: string): string | RegExp {
  if (!raw.startsWith(REGEXP_PREFIX)) {
    return raw;
  }

  const source = raw.slice(REGEXP_PREFIX.length);
  try {
    return new RegExp(source);
  } catch (error) {
    throw new ConfigurationError(`Invalid filter pattern: ${source}`, { source }, { cause: error });
  }
}

/**
 * Session options from THROTTLE_* environment variables
 */
export function loadThrottleOptions(settings: ThrottlingEnv = ENV.THROTTLING): ThrottleOptions {
  return {
    rateLimit: settings.RATE_LIMIT,
    limitFiltered: settings.LIMIT_FILTERED,
    shutdownGraceMs: settings.SHUTDOWN_GRACE_MS,
    filters: parseFilterList(settings.FILTERS),
  };
}
