import { ConfigError, ConfigErrorCode } from "@errors/ConfigError";

describe("ConfigError", () => {
  describe("constructor", () => {
    it("should create error with message and default code", () => {
      const error = new ConfigError("Test error");
      expect(error.message).toBe("Test error");
      expect(error.code).toBe(ConfigErrorCode.UNKNOWN);
      expect(error.recoverable).toBe(false);
    });

    it("should create error with all parameters", () => {
      const error = new ConfigError(
        "Test error",
        ConfigErrorCode.VALIDATION_FAILED,
        true,
        { key: "value" },
      );
      expect(error.code).toBe(ConfigErrorCode.VALIDATION_FAILED);
      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual({ key: "value" });
    });
  });

  describe("static factory methods", () => {
    it("readError should include the original error", () => {
      const error = ConfigError.readError(
        "/path/to/config.json",
        new Error("Permission denied"),
      );

      expect(error.message).toContain("Permission denied");
      expect(error.code).toBe(ConfigErrorCode.FILE_READ_ERROR);
      expect(error.recoverable).toBe(false);
    });

    it("invalidJSON should include the parse error", () => {
      const error = ConfigError.invalidJSON(
        "/path/to/config.json",
        new Error("Unexpected token"),
      );

      expect(error.message).toBe(
        "Invalid JSON in configuration file: Unexpected token",
      );
      expect(error.code).toBe(ConfigErrorCode.INVALID_JSON);
    });

    it("validationFailed should join every issue", () => {
      const error = ConfigError.validationFailed([
        "display.width: Expected number",
        "modules.0.name: Required",
      ]);

      expect(error.message).toBe(
        "Invalid configuration: display.width: Expected number; modules.0.name: Required",
      );
      expect(error.code).toBe(ConfigErrorCode.VALIDATION_FAILED);
      expect(error.context?.issues).toHaveLength(2);
    });

    it("duplicateModule should name the module", () => {
      const error = ConfigError.duplicateModule("sports");
      expect(error.message).toBe('A module named "sports" is already registered');
      expect(error.code).toBe(ConfigErrorCode.DUPLICATE_MODULE);
      expect(error.recoverable).toBe(false);
    });

    it("unknownModuleType should name the type", () => {
      const error = ConfigError.unknownModuleType("stocks");
      expect(error.message).toBe("Unknown module type: stocks");
      expect(error.code).toBe(ConfigErrorCode.UNKNOWN_MODULE_TYPE);
    });
  });
});
