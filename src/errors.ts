export {
  PerceptualHashError,
  ConfigurationError,
  HashInputError,
  SourceUnavailableError,
};

/**
 * Base class for every error raised by the hashing engine and its providers.
 */
class PerceptualHashError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid geometry, method, size or flag combination. Raised before any
 * computation takes place.
 */
class ConfigurationError extends PerceptualHashError {}

/**
 * Malformed hash input to the distance calculator (non-hex characters,
 * empty strings or mismatched lengths).
 */
class HashInputError extends PerceptualHashError {}

/**
 * A luminance grid provider could not produce a grid for the image
 * (decode failure, unsupported format, wrong dimensions).
 */
class SourceUnavailableError extends PerceptualHashError {
  readonly provider: string;

  constructor(provider: string, message: string, options?: ErrorOptions) {
    super(`[${provider}] ${message}`, options);
    this.provider = provider;
  }
}
