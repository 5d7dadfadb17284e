/* =============================================================================
 * LIVE ROUTE ERRORS
 * ============================================================================= */

/**
 * Definition-time error raised while compiling a live route.
 */
export class LiveRouteError extends Error {
  constructor(
    message: string,
    public readonly code: LiveRouteErrorCodeType,
    public readonly view?: string,
  ) {
    super(message);
    this.name = "LiveRouteError";
  }
}

/** Error codes */
export const LiveRouteErrorCode = {
  HELPER_NAME_INFERENCE: "LIVE_HELPER_NAME_INFERENCE",
  INVALID_OPTION: "LIVE_INVALID_OPTION",
  INVALID_VIEW: "LIVE_INVALID_VIEW",
  INVALID_ACTION: "LIVE_INVALID_ACTION",
  INVALID_CONFIG: "LIVE_INVALID_CONFIG",
} as const;

export type LiveRouteErrorCodeType = (typeof LiveRouteErrorCode)[keyof typeof LiveRouteErrorCode];
