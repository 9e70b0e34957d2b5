/**
 * Custom Error Classes for the UniMate Launcher
 */

/**
 * Base class for fatal launch conditions.
 * The launcher prints the message and hint, pauses, and exits with exitCode.
 */
export class LauncherError extends Error {
  public readonly exitCode: number;
  public readonly hint: string | undefined;

  constructor(message: string, hint?: string, exitCode: number = 1) {
    super(message);
    this.name = 'LauncherError';
    this.exitCode = exitCode;
    this.hint = hint;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Error thrown when no Python interpreter answers on the PATH
 */
export class InterpreterNotFoundError extends LauncherError {
  public readonly candidates: string[];

  constructor(candidates: string[]) {
    super(
      `Python is not installed or not on PATH (tried: ${candidates.join(', ')})`,
      'Install Python 3.10+ from https://www.python.org/ and re-run the launcher.'
    );
    this.name = 'InterpreterNotFoundError';
    this.candidates = candidates;
  }
}

/**
 * Error thrown when the API key in the configuration file is still the placeholder
 */
export class PlaceholderCredentialError extends LauncherError {
  public readonly envPath: string;
  public readonly key: string;

  constructor(envPath: string, key: string) {
    super(
      `${key} in ${envPath} is not configured`,
      `Edit ${envPath} and set ${key} to your Gemini API key.`
    );
    this.name = 'PlaceholderCredentialError';
    this.envPath = envPath;
    this.key = key;
  }
}

/**
 * Error thrown when dependencies are missing and there is no manifest to install from
 */
export class ManifestNotFoundError extends LauncherError {
  public readonly manifestPath: string;

  constructor(manifestPath: string) {
    super(
      `Dependencies are missing and ${manifestPath} was not found`,
      'Restore the requirements file or install the dependencies manually.'
    );
    this.name = 'ManifestNotFoundError';
    this.manifestPath = manifestPath;
  }
}

/**
 * Error thrown by verify-key when the model call fails
 */
export class CredentialCheckError extends LauncherError {
  public readonly model: string;

  constructor(model: string, cause: string) {
    super(`Gemini request to ${model} failed: ${cause}`, 'Check GOOGLE_API_KEY and GEMINI_MODEL in .env.');
    this.name = 'CredentialCheckError';
    this.model = model;
  }
}
