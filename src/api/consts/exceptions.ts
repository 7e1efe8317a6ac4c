import type { ExceptionDefinition } from "@/lib/exceptions/Exception.ts";

export default {
  API_TEST: [-9999, "API exception test"],
  API_REQUEST_PARAMS_INVALID: [-2000, "Invalid request parameters"],
  API_UNAUTHORIZED: [-2001, "Missing or invalid API key"],
  API_NOT_FOUND: [-2002, "Resource not found"],
  API_VALIDATION_FAILED: [-2003, "Generation request rejected"],
  API_POOL_EXHAUSTED: [-2004, "No token available"],
  API_CREDENTIAL_INVALID: [-2005, "Access credential invalid or refresh failed"],
  API_ADMISSION_REJECTED: [-2006, "Concurrency limit reached"],
  API_UPSTREAM_RATE_LIMITED: [-2007, "Upstream rate limit reached"],
  API_UPSTREAM_FAILED: [-2008, "Upstream request failed"],
  API_CACHE_DOWNLOAD_FAILED: [-2009, "Failed to cache file"],
  API_POLL_TIMEOUT: [-2010, "Video generation timed out"],
  API_GENERATION_FAILED: [-2011, "Generation failed, please retry"],
  API_TOKEN_CONFLICT: [-2012, "Token already exists"],
} satisfies Record<string, ExceptionDefinition>;
