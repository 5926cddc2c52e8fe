/**
 * Error types and helpers shared by the services and tools
 */

/**
 * Which credential file was missing
 */
export type CredentialsMissingKind = 'CredentialsFileMissing' | 'ServiceAccountFileMissing';

/**
 * Raised when no credential material exists at the configured path.
 * Fatal at startup; tools never catch it.
 */
export class CredentialsMissingError extends Error {
  constructor(
    public readonly kind: CredentialsMissingKind,
    public readonly path: string
  ) {
    super(
      kind === 'CredentialsFileMissing'
        ? `Credentials file not found at ${path}. Please download it from Google Cloud Console.`
        : `Service account key file not found at ${path}.`
    );
    this.name = 'CredentialsMissingError';
  }
}

/**
 * Message of a caught value, whatever was thrown
 */
export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps a caught value as an Error for `Result` failures
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
