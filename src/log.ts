// ---------------------------------------------------------------------------
// GatewayLogger
// ---------------------------------------------------------------------------

/**
 * Minimal logging surface shared by the registry, the server and the CLI.
 * The `log` export of `@clack/prompts` satisfies it structurally.
 */
export interface GatewayLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createConsoleLogger(prefix = "gateway"): GatewayLogger {
  return {
    info(message) {
      console.log(`[${prefix}] ${message}`);
    },
    warn(message) {
      console.warn(`[${prefix}] ${message}`);
    },
    error(message) {
      console.error(`[${prefix}] ${message}`);
    },
  };
}

export const silentLogger: GatewayLogger = {
  info() {},
  warn() {},
  error() {},
};
