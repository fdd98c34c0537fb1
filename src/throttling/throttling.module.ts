import { Module, type DynamicModule } from "@nestjs/common";
import { loadThrottleOptions } from "@/config/throttle-config.loader";
import { THROTTLED_SESSION, THROTTLING_OPTIONS } from "./throttling.constants";
import { createThrottledSession, type ThrottledSessionOptions } from "./throttled-session.factory";

/**
 * Provides a throttled session under the THROTTLED_SESSION token.
 * The session closes when the application shuts down.
 */
@Module({})
export class ThrottlingModule {
  static register(options: ThrottledSessionOptions = {}): DynamicModule {
    return {
      module: ThrottlingModule,
      providers: [
        { provide: THROTTLING_OPTIONS, useValue: options },
        {
          provide: THROTTLED_SESSION,
          useFactory: (sessionOptions: ThrottledSessionOptions) => createThrottledSession(sessionOptions),
          inject: [THROTTLING_OPTIONS],
        },
      ],
      exports: [THROTTLED_SESSION],
    };
  }

  /**
   * Global session configured from THROTTLE_* environment variables
   */
  static forRoot(http?: ThrottledSessionOptions["http"]): DynamicModule {
    return {
      ...ThrottlingModule.register({ ...loadThrottleOptions(), http }),
      global: true,
    };
  }
}
