/**
 * Environment Constants - Centralized Environment Variable Management
 */

import * as dotenv from "dotenv";
import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { LOG_LEVELS } from "@/common/types/logging";

dotenv.config();

// Environment Helpers
export const ENV_HELPERS = {
  isTest: (): boolean => ENV.APPLICATION.NODE_ENV === "test",
  isDevelopment: (): boolean => ENV.APPLICATION.NODE_ENV === "development",
  isProduction: (): boolean => ENV.APPLICATION.NODE_ENV === "production",
};

export const ENV = {
  // Application Settings
  APPLICATION: {
    NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
  },

  // Logging Configuration
  LOGGING: {
    LOG_LEVEL: EnvironmentUtils.parseEnum("LOG_LEVEL", LOG_LEVELS, "log"),
  },

  // Outbound throttling
  THROTTLING: {
    // requests/sec, 0 disables throttling
    RATE_LIMIT: EnvironmentUtils.parseFloat("THROTTLE_RATE_LIMIT", 0, { min: 0 }),
    LIMIT_FILTERED: EnvironmentUtils.parseBoolean("THROTTLE_LIMIT_FILTERED", false),
    // "[METHOD ]prefix" entries, "re:" marks a regular expression
    FILTERS: EnvironmentUtils.parseList("THROTTLE_FILTERS"),
    SHUTDOWN_GRACE_MS: EnvironmentUtils.parseInt("THROTTLE_SHUTDOWN_GRACE_MS", 500, { min: 0, max: 60000 }),
  },

  TIMEOUTS: {
    HTTP_MS: EnvironmentUtils.parseInt("HTTP_TIMEOUT_MS", 10000, { min: 1000, max: 120000 }),
  },
} as const;
