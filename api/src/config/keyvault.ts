import { AuthenticationError, CredentialUnavailableError, type TokenCredential } from '@azure/identity';
import { SecretClient } from '@azure/keyvault-secrets';
import type { ConfigEntry } from './configuration';
import { toLocalKey, type KeyStyle } from './keys';
import {
  AppError,
  AuthenticationRejected,
  CredentialUnavailable,
  KeyTranslationAmbiguous,
  SecretNotFound,
  VaultUnreachable,
  errorMessage
} from '../utils/errors';

export interface SecretSummary {
  name: string;
  enabled: boolean;
}

/** The slice of a vault this service reads. */
export interface SecretStore {
  readonly url: string;
  listSecrets(signal?: AbortSignal): AsyncIterable<SecretSummary>;
  /** undefined when the secret exists but carries no value */
  getSecret(name: string, signal?: AbortSignal): Promise<string | undefined>;
}

export function vaultUrl(nameOrUrl: string): string {
  if (/^https?:\/\//i.test(nameOrUrl)) return nameOrUrl.replace(/\/+$/, '');
  return `https://${nameOrUrl}.vault.azure.net`;
}

export function createSecretStore(url: string, credential: TokenCredential): SecretStore {
  const client = new SecretClient(url, credential);
  return {
    url,
    async *listSecrets(signal) {
      for await (const props of client.listPropertiesOfSecrets({ abortSignal: signal })) {
        yield { name: props.name, enabled: props.enabled !== false };
      }
    },
    async getSecret(name, signal) {
      const secret = await client.getSecret(name, { abortSignal: signal });
      return secret.value;
    }
  };
}

const NETWORK_CODES = new Set(['ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT', 'ECONNRESET', 'EAI_AGAIN', 'REQUEST_SEND_ERROR']);

function field(err: unknown, key: string): unknown {
  return err !== null && typeof err === 'object' && key in err ? Reflect.get(err, key) : undefined;
}

/** Maps SDK and transport failures onto the startup error taxonomy. */
export function classifyVaultError(err: unknown, url: string, secretName?: string): AppError {
  if (err instanceof AppError) return err;
  const message = errorMessage(err);
  if (err instanceof CredentialUnavailableError) {
    return new CredentialUnavailable(`Credential unavailable for ${url}: ${message}`, { cause: err });
  }
  if (err instanceof AuthenticationError) {
    return new AuthenticationRejected(`Authentication to ${url} was rejected: ${message}`, { cause: err });
  }
  const status = field(err, 'statusCode');
  if (status === 401 || status === 403) {
    return new AuthenticationRejected(`Vault ${url} refused access (HTTP ${status}): ${message}`, { cause: err });
  }
  if (status === 404 && secretName) {
    return new SecretNotFound(secretName, { cause: err });
  }
  const code = field(err, 'code');
  const name = field(err, 'name');
  if ((typeof code === 'string' && NETWORK_CODES.has(code)) || name === 'AbortError') {
    return new VaultUnreachable(`Vault ${url} is unreachable: ${message}`, { cause: err });
  }
  const detail = status === undefined ? message : `HTTP ${String(status)}: ${message}`;
  return new AppError('VaultError', `Vault ${url} failed: ${detail}`, 502, { cause: err });
}

export interface LoadSecretsOptions {
  style: KeyStyle;
  timeoutMs: number;
  /** remote names to load; every enabled secret when omitted */
  secretNames?: readonly string[];
}

async function withTimeout<T>(url: string, timeoutMs: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new VaultUnreachable(`Vault ${url} did not respond within ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Lists and fetches the vault's secrets and returns them under their local
 * hierarchical keys. Any failure rejects the whole load.
 */
export async function loadSecrets(store: SecretStore, options: LoadSecretsOptions): Promise<ConfigEntry[]> {
  const wanted = options.secretNames ? new Set(options.secretNames.map(n => n.toLowerCase())) : undefined;
  return withTimeout(store.url, options.timeoutMs, async signal => {
    const names: string[] = [];
    try {
      for await (const s of store.listSecrets(signal)) {
        if (!s.enabled) continue;
        if (wanted && !wanted.has(s.name.toLowerCase())) continue;
        names.push(s.name);
      }
    } catch (e) {
      throw classifyVaultError(e, store.url);
    }
    if (options.secretNames) {
      const listed = new Set(names.map(n => n.toLowerCase()));
      const missing = options.secretNames.find(n => !listed.has(n.toLowerCase()));
      if (missing !== undefined) throw new SecretNotFound(missing);
    }

    const seen = new Map<string, string>();
    const entries: ConfigEntry[] = [];
    for (const name of names) {
      const key = toLocalKey(name, options.style);
      const clash = seen.get(key.toLowerCase());
      if (clash !== undefined) {
        throw new KeyTranslationAmbiguous(`Secrets "${clash}" and "${name}" both map to "${key}"`);
      }
      seen.set(key.toLowerCase(), name);
      let value: string | undefined;
      try {
        value = await store.getSecret(name, signal);
      } catch (e) {
        throw classifyVaultError(e, store.url, name);
      }
      if (value !== undefined) entries.push({ key, value });
    }
    return entries;
  });
}

/** Explicit lookup of a single secret by its remote name. */
export async function getNamedSecret(store: SecretStore, name: string, timeoutMs: number): Promise<string> {
  return withTimeout(store.url, timeoutMs, async signal => {
    let value: string | undefined;
    try {
      value = await store.getSecret(name, signal);
    } catch (e) {
      throw classifyVaultError(e, store.url, name);
    }
    if (value === undefined) throw new SecretNotFound(name);
    return value;
  });
}
