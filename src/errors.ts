// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

/** Base class for every error the gateway raises on purpose. */
export class GatewayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A route group failed to load or mount. Recovered by the registry. */
export class RegistrationError extends GatewayError {
  constructor(
    readonly descriptorName: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Malformed client input. Surfaced as HTTP 400. */
export class ValidationError extends GatewayError {
  readonly status = 400;
}

/** Invalid environment or overrides. Fatal at startup. */
export class ConfigError extends GatewayError {}

/** The completion provider failed: network, timeout, status or shape. */
export class UpstreamError extends GatewayError {
  constructor(
    message: string,
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
