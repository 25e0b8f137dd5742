import { describe, expect, it } from "vitest";
import { AppError, ConfigError, HttpStatusError, errorCode, errorMessage } from "../../src/shared/errors";

describe("errors", () => {
  it("carries a code and context", () => {
    const e = new HttpStatusError(502, "https://images.test/a.png");
    expect(e).toBeInstanceOf(AppError);
    expect(e.name).toBe("HttpStatusError");
    expect(e.message).toBe("HTTP 502 for https://images.test/a.png");
    expect(e.code).toBe("HTTP_STATUS_ERROR");
    expect(e.context).toEqual({ status: 502, url: "https://images.test/a.png" });
  });

  it("keeps config issues", () => {
    const e = new ConfigError("Invalid configuration", ["ftp.host: required"]);
    expect(e.issues).toEqual(["ftp.host: required"]);
    expect(e.code).toBe("CONFIG_ERROR");
  });

  it("reads messages and codes from unknown values", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(404)).toBe("404");
    expect(errorCode(Object.assign(new Error("x"), { code: "ENOENT" }))).toBe("ENOENT");
    expect(errorCode({ code: 5 })).toBeUndefined();
    expect(errorCode("ENOENT")).toBeUndefined();
  });
});
