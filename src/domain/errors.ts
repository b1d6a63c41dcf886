export class UpstreamRequestError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'UpstreamRequestError';
  }
}

export class MalformedPayloadError extends Error {
  constructor(
    readonly dataset: string,
    detail: string,
  ) {
    super(`Malformed ${dataset} payload: ${detail}`);
    this.name = 'MalformedPayloadError';
  }
}

/** The stock universe could not be obtained from upstream, cache or snapshot. */
export class UniverseUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'UniverseUnavailableError';
  }
}

export class SettingsValidationError extends Error {
  constructor(
    readonly filePath: string,
    readonly issues: string[],
  ) {
    super(`Invalid settings in ${filePath}: ${issues.join('; ')}`);
    this.name = 'SettingsValidationError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
