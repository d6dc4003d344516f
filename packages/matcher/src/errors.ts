export type ConfigurationErrorCode =
  | "INVALID_THRESHOLD"
  | "THRESHOLD_ORDER"
  | "INVALID_WEIGHTS"
  | "INVALID_ENV";

interface ErrorOptions<TCode extends string> {
  code: TCode;
  message: string;
  cause?: unknown;
}

export class ConfigurationError extends Error {
  override name = "ConfigurationError";
  override cause?: unknown;
  code: ConfigurationErrorCode;

  constructor({ code, message, cause }: ErrorOptions<ConfigurationErrorCode>) {
    super(message);
    this.code = code;
    this.cause = cause;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
