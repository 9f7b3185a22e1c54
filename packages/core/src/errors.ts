/**
 * Error taxonomy shared by every FlowPulse package.
 *
 * Only ConfigError and a startup ConnectionError are fatal; everything
 * else is caught at category or cycle level and logged.
 */

// ─── Error Types ───────────────────────────────────────────────────

export class FlowPulseError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'FlowPulseError';
  }
}

/** Required configuration missing or invalid */
export class ConfigError extends FlowPulseError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

/** Tracker or sink unreachable */
export class ConnectionError extends FlowPulseError {
  constructor(message: string) {
    super(message, 'CONNECTION_FAILED');
    this.name = 'ConnectionError';
  }
}

/** A single record could not be interpreted */
export class ParseError extends FlowPulseError {
  constructor(message: string, public readonly input?: string) {
    super(message, 'PARSE_FAILED');
    this.name = 'ParseError';
  }
}

/** One or more metric or alert categories failed during a cycle */
export class PartialDataError extends FlowPulseError {
  constructor(public readonly failedCategories: string[]) {
    super(`Categories failed: ${failedCategories.join(', ')}`, 'PARTIAL_DATA');
    this.name = 'PartialDataError';
  }
}

/** Delivery to the alert webhook or the metrics backend failed */
export class TransportError extends FlowPulseError {
  constructor(
    message: string,
    public readonly target: string,
    public readonly status?: number
  ) {
    super(message, 'TRANSPORT_FAILED');
    this.name = 'TransportError';
  }
}

// ─── Helpers ───────────────────────────────────────────────────────

/** Render an unknown thrown value as a message */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
