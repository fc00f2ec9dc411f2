export type PersonaCardErrorCode =
  | "CONFIGURATION"
  | "MISSING_CREDENTIALS"
  | "USER_NOT_FOUND"
  | "EXTERNAL_API"
  | "MALFORMED_PERSONA_RESPONSE"
  | "RENDER_IO";

export type ExternalService = "reddit" | "gemini";

/**
 * Base class for every failure the pipeline reports. All of them are fatal:
 * the CLI prints the message and exits non-zero.
 */
export abstract class PersonaCardError extends Error {
  abstract readonly code: PersonaCardErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PersonaCardError {
  readonly code: PersonaCardErrorCode = "CONFIGURATION";
}

export class MissingCredentialsError extends ConfigurationError {
  override readonly code = "MISSING_CREDENTIALS";

  constructor(readonly missing: readonly string[]) {
    super(`Missing required environment variables: ${missing.join(", ")}`);
  }
}

export class UserNotFoundError extends PersonaCardError {
  readonly code = "USER_NOT_FOUND";

  constructor(readonly username: string, reason = "does not exist") {
    super(`Reddit user "${username}" ${reason}`);
  }
}

export class ExternalAPIError extends PersonaCardError {
  readonly code = "EXTERNAL_API";

  constructor(
    readonly service: ExternalService,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(
      status === undefined
        ? `${service} API error: ${message}`
        : `${service} API error (HTTP ${status}): ${message}`,
      options
    );
  }
}

export class MalformedPersonaResponseError extends PersonaCardError {
  readonly code = "MALFORMED_PERSONA_RESPONSE";

  constructor(reason: string, readonly excerpt: string, options?: { cause?: unknown }) {
    super(`Malformed persona response: ${reason}`, options);
  }
}

export class RenderIOError extends PersonaCardError {
  readonly code = "RENDER_IO";

  constructor(readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to write persona card to ${path}`, options);
  }
}
