import { WithLogging } from "./mixins/logging.mixin";

// Create a simple base class
class SimpleBase {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  constructor(..._args: any[]) {
    // Empty constructor
  }
}

export const LoggingBase = WithLogging(SimpleBase);

/**
 * Base service class that provides common logging functionality.
 * All logging methods are inherited from WithLogging mixin
 */
export abstract class BaseService extends LoggingBase {}
