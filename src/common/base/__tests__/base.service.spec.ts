import { FilteredLogger } from "../../logging/filtered-logger";
import { BaseService } from "../base.service";
import { ConfigurableService } from "../composed.service";

class TestService extends BaseService {}

interface TestConfig extends Record<string, unknown> {
  limit: number;
  label: string;
}

class TestConfigService extends ConfigurableService<TestConfig>({ limit: 1, label: "default" }) {
  readonly updates: Array<[TestConfig, TestConfig]> = [];

  override validateConfig(): void {
    if (this.config.limit < 0) {
      throw new Error(`limit must not be negative: ${this.config.limit}`);
    }
  }

  override onConfigUpdated(oldConfig: TestConfig, newConfig: TestConfig): void {
    this.updates.push([oldConfig, newConfig]);
  }
}

describe("BaseService", () => {
  describe("logging", () => {
    it("should give every service a level-filtered logger", () => {
      expect(new TestService().logger).toBeInstanceOf(FilteredLogger);
    });

    it("should prefix messages with their context", () => {
      const service = new TestService();
      const warn = jest.spyOn(service.logger, "warn").mockImplementation(() => undefined);

      service.logWarning("queue is full", "put", { size: 4 });
      service.logWarning("no context");

      expect(warn).toHaveBeenNthCalledWith(1, "[put] queue is full", { size: 4 });
      expect(warn).toHaveBeenNthCalledWith(2, "no context");
    });

    it("should log errors with their stack", () => {
      const service = new TestService();
      const error = jest.spyOn(service.logger, "error").mockImplementation(() => undefined);
      const failure = new Error("failed");

      service.logError(failure, "fill");

      expect(error).toHaveBeenCalledWith("[fill] failed", failure.stack);
    });

    it("should use default lifecycle messages", () => {
      const service = new TestService();
      const log = jest.spyOn(service.logger, "log").mockImplementation(() => undefined);

      service.logInitialization();
      service.logShutdown("bye");

      expect(log).toHaveBeenNthCalledWith(1, "TestService initialized");
      expect(log).toHaveBeenNthCalledWith(2, "bye");
    });
  });

  describe("configuration", () => {
    let service: TestConfigService;

    beforeEach(() => {
      service = new TestConfigService();
      jest.spyOn(service.logger, "debug").mockImplementation(() => undefined);
      jest.spyOn(service.logger, "log").mockImplementation(() => undefined);
    });

    it("should start from the defaults", () => {
      expect(service.getConfig()).toEqual({ limit: 1, label: "default" });
    });

    it("should merge updates and report them", () => {
      service.updateConfig({ limit: 5 });

      expect(service.getConfig()).toEqual({ limit: 5, label: "default" });
      expect(service.updates).toEqual([
        [
          { limit: 1, label: "default" },
          { limit: 5, label: "default" },
        ],
      ]);
    });

    it("should roll back an update that fails validation", () => {
      const error = jest.spyOn(service.logger, "error").mockImplementation(() => undefined);

      expect(() => service.updateConfig({ limit: -1, label: "bad" })).toThrow("limit must not be negative: -1");

      expect(service.getConfig()).toEqual({ limit: 1, label: "default" });
      expect(service.updates).toHaveLength(0);
      expect(error).toHaveBeenCalledWith(
        "[Configuration update failed, rolled back] limit must not be negative: -1",
        expect.any(String)
      );
    });

    it("should list changed keys only", () => {
      expect(
        service.getConfigChanges({ limit: 1, label: "default" }, { limit: 2, label: "default" })
      ).toEqual({ limit: { old: 1, new: 2 } });
    });

    it("should reset to the defaults", () => {
      service.updateConfig({ limit: 9, label: "changed" });

      service.resetConfig();

      expect(service.getConfig()).toEqual({ limit: 1, label: "default" });
      expect(service.updates).toHaveLength(2);
    });

    it("should hand out copies of the configuration", () => {
      const config = service.getConfig();

      expect(config).not.toBe(service.config);
      expect(config).toEqual(service.config);
    });
  });
});
