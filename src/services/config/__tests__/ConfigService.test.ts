import { ConfigService } from "@services/config/ConfigService";
import { ConfigErrorCode } from "@core/errors";
import { MatrixDriverType } from "@core/types";
import * as fs from "fs/promises";

jest.mock("fs/promises");

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

const mockFs = jest.mocked(fs);

const errno = (code: string): NodeJS.ErrnoException =>
  Object.assign(new Error(`${code}: file error`), { code });

const withFile = (contents: unknown) =>
  mockFs.readFile.mockResolvedValue(JSON.stringify(contents));

describe("ConfigService", () => {
  const testConfigPath = "./test-config.json";

  const createService = (env: NodeJS.ProcessEnv = {}) =>
    new ConfigService({ configPath: testConfigPath, env });

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe("initialization", () => {
    it("should use the built-in defaults when the file does not exist", async () => {
      mockFs.readFile.mockRejectedValue(errno("ENOENT"));
      const service = createService();

      const result = await service.initialize();

      expect(result.success).toBe(true);
      expect(service.getDisplayConfig()).toMatchObject({
        width: 64,
        height: 32,
        tickRateHz: 30,
        driver: MatrixDriverType.EMULATOR,
      });
      expect(service.getEnabledModules().map((m) => m.name)).toEqual([
        "sports",
        "weather",
        "news",
      ]);
    });

    it("should fill in defaults around the file contents", async () => {
      withFile({
        display: { width: 128 },
        modules: [{ type: "weather", name: "wx" }],
      });
      const service = createService();

      await service.initialize();

      expect(service.getDisplayConfig().width).toBe(128);
      expect(service.getDisplayConfig().height).toBe(32);
      expect(service.getDisplayConfig().brightness.minBrightness).toBe(20);
      expect(service.getScrollConfig()).toEqual({
        settleSeconds: 1.5,
        speedPxPerSecond: 20,
      });
      expect(service.getEnabledModules()).toEqual([
        {
          type: "weather",
          name: "wx",
          enabled: true,
          refreshIntervalSeconds: 30,
          displayDurationSeconds: 20,
          params: { title: "WEATHER" },
        },
      ]);
    });

    it("should read the file only once", async () => {
      withFile({});
      const service = createService();

      await service.initialize();
      await service.initialize();

      expect(mockFs.readFile).toHaveBeenCalledTimes(1);
    });

    it("should take the path from CONFIG_PATH", async () => {
      withFile({});
      const service = new ConfigService({ env: { CONFIG_PATH: "/etc/display.json" } });

      await service.initialize();

      expect(service.getConfigPath()).toBe("/etc/display.json");
      expect(mockFs.readFile).toHaveBeenCalledWith("/etc/display.json", "utf-8");
    });
  });

  describe("errors", () => {
    it("should fail on invalid JSON", async () => {
      mockFs.readFile.mockResolvedValue("{ not json");

      const result = await createService().initialize();

      expect(!result.success && result.error.code).toBe(ConfigErrorCode.INVALID_JSON);
    });

    it("should fail when the file cannot be read", async () => {
      mockFs.readFile.mockRejectedValue(errno("EACCES"));

      const result = await createService().initialize();

      expect(!result.success && result.error.code).toBe(
        ConfigErrorCode.FILE_READ_ERROR,
      );
    });

    it("should report schema problems by path", async () => {
      withFile({ display: { width: -1 } });

      const result = await createService().initialize();

      expect(!result.success && result.error.message).toBe(
        "Invalid configuration: display.width: Number must be greater than 0",
      );
    });

    it("should reject an unknown module type", async () => {
      withFile({ modules: [{ type: "stocks", name: "stocks" }] });

      const result = await createService().initialize();

      expect(!result.success && result.error.code).toBe(
        ConfigErrorCode.VALIDATION_FAILED,
      );
    });

    it("should reject duplicate module names", async () => {
      withFile({
        modules: [
          { type: "weather", name: "a" },
          { type: "weather", name: "a" },
        ],
      });

      const result = await createService().initialize();

      expect(!result.success && result.error.message).toBe(
        'Invalid configuration: modules.1.name: Duplicate module name "a"',
      );
    });

    it("should require an API key for an enabled transit module", async () => {
      withFile({
        modules: [{ type: "transit", name: "transit", params: { addresses: ["1 Main St"] } }],
      });

      const result = await createService().initialize();

      expect(!result.success && result.error.message).toBe(
        "Invalid configuration: modules.0.params.apiKey: Predictions API key is required (set TRANSIT_API_KEY)",
      );
    });
  });

  describe("environment overrides", () => {
    it("should override display and preview settings", async () => {
      withFile({ display: { width: 32 } });
      const service = createService({
        DISPLAY_DRIVER: "terminal",
        DISPLAY_WIDTH: "128",
        DISPLAY_HEIGHT: "64",
        TICK_RATE_HZ: "10",
        PREVIEW_ENABLED: "true",
        PREVIEW_PORT: "9000",
      });

      await service.initialize();

      expect(service.getDisplayConfig()).toMatchObject({
        driver: MatrixDriverType.TERMINAL,
        width: 128,
        height: 64,
        tickRateHz: 10,
      });
      expect(service.getPreviewConfig()).toEqual({
        enabled: true,
        host: "0.0.0.0",
        port: 9000,
      });
    });

    it("should validate overridden values", async () => {
      withFile({});

      const result = await createService({ DISPLAY_WIDTH: "wide" }).initialize();

      expect(!result.success && result.error.message).toBe(
        "Invalid configuration: display.width: Expected number, received nan",
      );
    });

    it("should put TRANSIT_API_KEY into every transit module", async () => {
      withFile({
        modules: [{ type: "transit", name: "transit", params: { addresses: ["1 Main St"] } }],
      });
      const service = createService({ TRANSIT_API_KEY: "test-secret" });

      const result = await service.initialize();

      expect(result.success).toBe(true);
      const [transit] = service.getEnabledModules();
      expect(transit.type === "transit" && transit.params.apiKey).toBe("test-secret");
    });
  });

  it("should leave disabled modules out of the rotation", async () => {
    withFile({
      modules: [
        { type: "weather", name: "a" },
        { type: "weather", name: "b", enabled: false },
      ],
    });
    const service = createService();

    await service.initialize();

    expect(service.getConfig().modules).toHaveLength(2);
    expect(service.getEnabledModules().map((m) => m.name)).toEqual(["a"]);
  });
});
