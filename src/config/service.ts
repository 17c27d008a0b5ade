/**
 * Service identity reported by the liveness endpoint.
 */
export const SERVICE_INFO = {
  name: "Memory Gateway",
  version: "1.0.0",
} as const;

export const DEFAULT_USER_ID = "default_user";

export const DEFAULT_SEARCH_LIMIT = 5;
