import { WebError, WebErrorCode } from "@errors/WebError";

describe("WebError", () => {
  it("should default to the unknown code", () => {
    const error = new WebError("Test error");
    expect(error.code).toBe(WebErrorCode.UNKNOWN);
    expect(error.recoverable).toBe(true);
  });

  it("serverStartFailed should name the port and cause", () => {
    const error = WebError.serverStartFailed(8080, new Error("EACCES"));
    expect(error.message).toBe(
      "Failed to start preview server on port 8080: EACCES",
    );
    expect(error.code).toBe(WebErrorCode.SERVER_START_FAILED);
    expect(error.context).toEqual({ port: 8080, originalError: "EACCES" });
  });

  it("portInUse should carry the port", () => {
    const error = WebError.portInUse(8080);
    expect(error.message).toBe("Port 8080 is already in use");
    expect(error.code).toBe(WebErrorCode.PORT_IN_USE);
    expect(error.context).toEqual({ port: 8080 });
  });
});
