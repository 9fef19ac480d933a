import { BaseError } from "@errors/BaseError";

class TestError extends BaseError {
  constructor(
    message: string,
    code: string = "TEST_ERROR",
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }
}

describe("BaseError", () => {
  describe("constructor", () => {
    it("should create error with message and code", () => {
      const error = new TestError("Test message", "TEST_CODE");

      expect(error.message).toBe("Test message");
      expect(error.code).toBe("TEST_CODE");
      expect(error.recoverable).toBe(false);
      expect(error.timestamp).toBeInstanceOf(Date);
    });

    it("should create error with all parameters", () => {
      const context = { key: "value" };
      const error = new TestError("Test message", "TEST_CODE", true, context);

      expect(error.recoverable).toBe(true);
      expect(error.context).toEqual(context);
    });

    it("should set the error name to the constructor name", () => {
      const error = new TestError("Test message");
      expect(error.name).toBe("TestError");
    });

    it("should keep instanceof working for subclasses", () => {
      const error = new TestError("Test message");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(BaseError);
      expect(error).toBeInstanceOf(TestError);
    });
  });

  describe("toResponse", () => {
    it("should pair the code with the user message", () => {
      const error = new TestError("socket hang up", "FETCH_TIMEOUT");

      expect(error.toResponse()).toEqual({
        code: "FETCH_TIMEOUT",
        message: "Data source did not answer in time.",
      });
    });
  });

  describe("getUserMessage", () => {
    it("should return the message registered for the code", () => {
      const error = new TestError("Technical message", "FETCH_TIMEOUT");
      expect(error.getUserMessage()).toBe(
        "Data source did not answer in time.",
      );
    });

    it("should return the family fallback for an unlisted code", () => {
      const error = new TestError("Technical message", "RENDER_SOMETHING_NEW");
      expect(error.getUserMessage()).toBe("Rendering error occurred.");
    });

    it("should return the generic fallback for an unknown family", () => {
      const error = new TestError("Technical message", "UNKNOWN_CODE");
      expect(error.getUserMessage()).toBe("An error occurred.");
    });
  });
});
