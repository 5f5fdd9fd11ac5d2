export class StabilityProbeError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised before any probe runs. `setting` names the offending option.
 */
export class ConfigurationError extends StabilityProbeError {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super('CONFIGURATION_ERROR', `Invalid ${setting}: ${message}`);
    this.setting = setting;
  }
}

export class ReportSinkError extends StabilityProbeError {
  readonly destination: string;

  constructor(destination: string, cause: unknown) {
    super('REPORT_SINK_ERROR', `Could not write report to ${destination}: ${errorMessage(cause)}`, { cause });
    this.destination = destination;
  }
}

export class LogCollectionError extends StabilityProbeError {
  readonly containerId: string;

  constructor(containerId: string, cause: unknown) {
    super('LOG_COLLECTION_ERROR', `Could not collect logs for container ${containerId}: ${errorMessage(cause)}`, { cause });
    this.containerId = containerId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
