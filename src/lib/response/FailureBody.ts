import EX from "@/api/consts/exceptions.ts";
import type { ExceptionDefinition } from "@/lib/exceptions/Exception.ts";
import Exception from "@/lib/exceptions/Exception.ts";

export interface ErrorEnvelope {
  error: {
    message: string;
    type: string;
    code: string;
  };
}

interface ErrorMapping {
  status: number;
  type: string;
  code: string;
}

const GENERATION: Omit<ErrorMapping, "status"> = { type: "invalid_request_error", code: "generation_failed" };

const MAPPINGS: Array<[ExceptionDefinition, ErrorMapping]> = [
  [EX.API_REQUEST_PARAMS_INVALID, { status: 400, type: "invalid_request_error", code: "invalid_parameters" }],
  [EX.API_UNAUTHORIZED, { status: 401, type: "authentication_error", code: "invalid_api_key" }],
  [EX.API_NOT_FOUND, { status: 404, type: "invalid_request_error", code: "not_found" }],
  [EX.API_TOKEN_CONFLICT, { status: 409, type: "invalid_request_error", code: "conflict" }],
  [EX.API_VALIDATION_FAILED, { status: 400, ...GENERATION }],
  [EX.API_POOL_EXHAUSTED, { status: 503, ...GENERATION }],
  [EX.API_CREDENTIAL_INVALID, { status: 502, ...GENERATION }],
  [EX.API_ADMISSION_REJECTED, { status: 429, ...GENERATION }],
  [EX.API_UPSTREAM_RATE_LIMITED, { status: 429, ...GENERATION }],
  [EX.API_UPSTREAM_FAILED, { status: 502, ...GENERATION }],
  [EX.API_CACHE_DOWNLOAD_FAILED, { status: 502, ...GENERATION }],
  [EX.API_POLL_TIMEOUT, { status: 504, ...GENERATION }],
  [EX.API_GENERATION_FAILED, { status: 500, ...GENERATION }],
];

const FALLBACK: ErrorMapping = { status: 500, type: "server_error", code: "internal_error" };

/** HTTP status and OpenAI-style error body for any thrown value. */
export function errorEnvelope(error: unknown): { status: number; body: ErrorEnvelope } {
  if (!(error instanceof Exception)) {
    const message = error instanceof Error ? error.message : String(error);
    return { status: FALLBACK.status, body: { error: { message, type: FALLBACK.type, code: FALLBACK.code } } };
  }
  const mapping = MAPPINGS.find(([definition]) => error.compare(definition))?.[1] ?? FALLBACK;
  return {
    status: error.httpStatusCode ?? mapping.status,
    body: { error: { message: error.errmsg, type: mapping.type, code: mapping.code } },
  };
}
