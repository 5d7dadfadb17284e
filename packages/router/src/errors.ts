/**
 * Error raised while defining a router or building paths from its table.
 */
export class RouterError extends Error {
  constructor(
    message: string,
    public readonly code: RouterErrorCodeType,
  ) {
    super(message);
    this.name = "RouterError";
  }
}

/** Error codes */
export const RouterErrorCode = {
  INVALID_NAMESPACE: "ROUTER_INVALID_NAMESPACE",
  INVALID_PATH: "ROUTER_INVALID_PATH",
  INVALID_HELPER: "ROUTER_INVALID_HELPER",
  DUPLICATE_PIPELINE: "ROUTER_DUPLICATE_PIPELINE",
  UNKNOWN_PIPELINE: "ROUTER_UNKNOWN_PIPELINE",
  SEALED: "ROUTER_SEALED",
  UNKNOWN_HELPER: "ROUTER_UNKNOWN_HELPER",
  PARAM_MISMATCH: "ROUTER_PARAM_MISMATCH",
} as const;

export type RouterErrorCodeType = (typeof RouterErrorCode)[keyof typeof RouterErrorCode];
