import { describe, expect, it } from "vitest";

import EX from "@/api/consts/exceptions.ts";
import APIException from "@/lib/exceptions/APIException.ts";
import { errorEnvelope } from "@/lib/response/FailureBody.ts";

describe("errorEnvelope", () => {
  it("maps gateway errors to their HTTP status", () => {
    expect(errorEnvelope(new APIException(EX.API_POOL_EXHAUSTED)).status).toBe(503);
    expect(errorEnvelope(new APIException(EX.API_ADMISSION_REJECTED)).status).toBe(429);
    expect(errorEnvelope(new APIException(EX.API_POLL_TIMEOUT)).status).toBe(504);
    expect(errorEnvelope(new APIException(EX.API_TOKEN_CONFLICT)).status).toBe(409);
  });

  it("uses the exception message in an OpenAI style body", () => {
    expect(errorEnvelope(new APIException(EX.API_UNAUTHORIZED, "Invalid API key"))).toEqual({
      status: 401,
      body: { error: { message: "Invalid API key", type: "authentication_error", code: "invalid_api_key" } },
    });
  });

  it("honours an explicit status code", () => {
    const error = new APIException(EX.API_NOT_FOUND, "gone").setHTTPStatusCode(410);
    expect(errorEnvelope(error).status).toBe(410);
  });

  it("treats anything else as an internal error", () => {
    expect(errorEnvelope(new Error("boom"))).toEqual({
      status: 500,
      body: { error: { message: "boom", type: "server_error", code: "internal_error" } },
    });
    expect(errorEnvelope("plain").body.error.message).toBe("plain");
  });
});
