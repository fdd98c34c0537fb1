import { BaseService } from "@/common/base/base.service";
import { asError } from "@/common/utils/error.utils";
import { ConfigurationError, InvalidMethodError } from "@/common/errors/throttling.errors";
import {
  isHttpMethod,
  type FilterRule,
  type FilterSettings,
  type FilterSpec,
  type HttpMethod,
  type UrlPattern,
} from "./interfaces/throttling.interfaces";

interface CompiledRule extends FilterRule {
  matches(url: string): boolean;
}

type FilterTuple = Extract<FilterSpec, readonly unknown[]>;

function isUrlPattern(value: unknown): value is UrlPattern {
  return typeof value === "string" || value instanceof RegExp;
}

function isFilterTuple(spec: FilterSpec): spec is FilterTuple {
  return Array.isArray(spec);
}

/**
 * Normalize any accepted filter shape into a rule, validating the method
 */
export function toFilterRule(spec: FilterSpec): FilterRule {
  let method: unknown;
  let pattern: unknown;

  if (isUrlPattern(spec)) {
    pattern = spec;
  } else if (isFilterTuple(spec)) {
    const entries: readonly unknown[] = spec;
    if (entries.length !== 2) {
      throw new ConfigurationError(`Filter tuple must be [method, pattern], got ${entries.length} element(s)`);
    }
    [method, pattern] = entries;
  } else if (typeof spec === "object" && spec !== null && "pattern" in spec) {
    method = spec.method;
    pattern = spec.pattern;
  } else {
    throw new ConfigurationError(`Malformed filter: ${String(spec)}`);
  }

  if (!isUrlPattern(pattern)) {
    throw new ConfigurationError(`Filter pattern must be a string or RegExp: ${String(pattern)}`);
  }
  if (method === null || method === undefined) {
    return { pattern };
  }
  if (!isHttpMethod(method)) {
    throw new ConfigurationError(`'method' is not null or a valid HTTP method: ${String(method)}`, { method });
  }
  return { method, pattern };
}

function toPublicRule({ method, pattern }: CompiledRule): FilterRule {
  return method ? { method, pattern } : { pattern };
}

function compile(rule: FilterRule): CompiledRule {
  const { pattern } = rule;

  if (typeof pattern === "string") {
    return { ...rule, matches: url => url.startsWith(pattern) };
  }

  // sticky with lastIndex 0 pins the match to the start of the URL
  const anchored = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, "") + "y");
  return {
    ...rule,
    matches: url => {
      anchored.lastIndex = 0;
      return anchored.test(url);
    },
  };
}

/**
 * Decides per request whether throttling applies.
 *
 * Rules are checked in registration order and the first match returns
 * `limitFiltered`; no match returns `!limitFiltered`. So with `limitFiltered`
 * false the rules list exemptions, with true they list the throttled set.
 */
export class UrlFilterEngine extends BaseService {
  private readonly rules: CompiledRule[] = [];

  constructor(
    private readonly settings: () => FilterSettings,
    filters: readonly FilterSpec[] = []
  ) {
    super();
    if (!Array.isArray(filters)) {
      throw new ConfigurationError("filters has to be a list");
    }
    for (const filter of filters) {
      this.rules.push(compile(toFilterRule(filter)));
    }
  }

  get filters(): readonly FilterRule[] {
    return this.rules.map(toPublicRule);
  }

  addFilter(pattern: UrlPattern, method?: HttpMethod | string | null): FilterRule {
    const rule = toFilterRule([method, pattern]);
    this.rules.push(compile(rule));
    return rule;
  }

  /**
   * First rule, in registration order, that covers the request
   */
  matchingRule(method: HttpMethod, url: string): FilterRule | undefined {
    const rule = this.rules.find(
      candidate => (candidate.method === undefined || candidate.method === method) && candidate.matches(url)
    );
    return rule && toPublicRule(rule);
  }

  /**
   * Whether a request must wait for an admission token. An unknown method is
   * logged and treated as throttled.
   */
  isLimited(method: string, url: string): boolean {
    const { rateLimit, limitFiltered } = this.settings();

    try {
      if (rateLimit === 0) {
        return false;
      }
      if (!isHttpMethod(method)) {
        throw new InvalidMethodError(method);
      }

      return this.matchingRule(method, url) ? limitFiltered : !limitFiltered;
    } catch (error) {
      if (error instanceof InvalidMethodError) {
        this.logWarning(error.message, "isLimited", error.toDetails(this.constructor.name));
      } else {
        this.logError(asError(error), "isLimited");
      }
    }
    return true;
  }
}
