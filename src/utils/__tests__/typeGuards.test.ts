import { WebError } from "@core/errors/WebError";
import { FetchError } from "@core/errors/FetchError";
import {
  toError,
  isNodeJSErrnoException,
  isTimeoutError,
  isBaseError,
  extractErrorInfo,
  isRecord,
} from "../typeGuards";

describe("typeGuards", () => {
  describe("toError", () => {
    it("should return Error instances unchanged", () => {
      const error = new Error("test error");
      expect(toError(error)).toBe(error);
    });

    it("should convert string to Error", () => {
      const result = toError("string error");
      expect(result).toBeInstanceOf(Error);
      expect(result.message).toBe("string error");
    });

    it("should convert object with message property to Error", () => {
      expect(toError({ message: "object error" }).message).toBe(
        "object error",
      );
    });

    it("should convert other values with their string representation", () => {
      expect(toError(42).message).toBe("42");
      expect(toError(null).message).toBe("null");
      expect(toError(undefined).message).toBe("undefined");
    });

    it("should preserve custom Error subclasses", () => {
      const webError = WebError.portInUse(8080);
      expect(toError(webError)).toBe(webError);
    });
  });

  describe("isNodeJSErrnoException", () => {
    it("should return true for error with code property", () => {
      const error = Object.assign(new Error("ENOENT"), { code: "ENOENT" });
      expect(isNodeJSErrnoException(error)).toBe(true);
    });

    it("should return false for plain errors and non-errors", () => {
      expect(isNodeJSErrnoException(new Error("plain"))).toBe(false);
      expect(isNodeJSErrnoException({ code: "ENOENT" })).toBe(false);
    });
  });

  describe("isTimeoutError", () => {
    it("should recognise timeout and abort errors by name", () => {
      const timeout = new Error("signal timed out");
      timeout.name = "TimeoutError";
      const abort = new Error("aborted");
      abort.name = "AbortError";

      expect(isTimeoutError(timeout)).toBe(true);
      expect(isTimeoutError(abort)).toBe(true);
      expect(isTimeoutError(new Error("other"))).toBe(false);
      expect(isTimeoutError("TimeoutError")).toBe(false);
    });
  });

  describe("isBaseError", () => {
    it("should accept BaseError subclasses only", () => {
      expect(isBaseError(FetchError.noData("news", "empty"))).toBe(true);
      expect(isBaseError(new Error("plain"))).toBe(false);
    });
  });

  describe("extractErrorInfo", () => {
    it("should use code and user message of a BaseError", () => {
      expect(extractErrorInfo(WebError.portInUse(8080))).toEqual({
        code: "WEB_PORT_IN_USE",
        message: "Preview port is already in use.",
      });
    });

    it("should fall back to the message of a plain Error", () => {
      expect(extractErrorInfo(new Error("boom"))).toEqual({
        code: "UNKNOWN_ERROR",
        message: "boom",
      });
    });

    it("should stringify other values", () => {
      expect(extractErrorInfo(7)).toEqual({
        code: "UNKNOWN_ERROR",
        message: "7",
      });
    });
  });

  describe("isRecord", () => {
    it("should accept plain objects only", () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord("x")).toBe(false);
    });
  });
});
