// Error types shared by startup (credential/vault) and request handling (database).
// `status` and `code` are what middleware/error.ts renders.

export class AppError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(code: string, message: string, status = 500, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
    this.status = status;
  }
}

export class CredentialUnavailable extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CredentialUnavailable', message, 500, options);
  }
}

export class VaultUnreachable extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VaultUnreachable', message, 502, options);
  }
}

export class AuthenticationRejected extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('AuthenticationRejected', message, 502, options);
  }
}

export class SecretNotFound extends AppError {
  readonly secretName: string;

  constructor(secretName: string, options?: { cause?: unknown }) {
    super('SecretNotFound', `Secret ${secretName} was not found in the vault`, 404, options);
    this.secretName = secretName;
  }
}

export class KeyTranslationAmbiguous extends AppError {
  constructor(message: string) {
    super('KeyTranslationAmbiguous', message, 500);
  }
}

export class DatabaseConnectionFailed extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DatabaseConnectionFailed', message, 500, options);
  }
}

export class QueryFailed extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('QueryFailed', message, 500, options);
  }
}

export class MissingConfiguration extends AppError {
  readonly keys: string[];

  constructor(keys: string[]) {
    super('MissingConfiguration', `Missing required configuration: ${keys.join(', ')}`, 500);
    this.keys = keys;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
