/**
 * A failed call to one of the remote services (translator, speech, LLM).
 * `status` is null when no HTTP response was received or the reply was unusable.
 */
export class ServiceError extends Error {
  constructor(
    public service: string,
    public status: number | null,
    message: string
  ) {
    super(message);
    this.name = 'ServiceError';
  }
}

/**
 * Pinyin that could not be split into syllables
 */
export class PhoneticConversionError extends Error {
  constructor(
    public reading: string,
    message: string
  ) {
    super(message);
    this.name = 'PhoneticConversionError';
  }
}

/**
 * Invalid or missing configuration. Fatal to the process.
 */
export class ConfigError extends Error {
  constructor(public problems: string[]) {
    super(`Configuration errors:\n${problems.map(p => `  - ${p}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Missing or unreadable input file. Fatal to the process.
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InputError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
