import path from 'path';
import type { AppSettings } from '../src/config/env';
import { KEY_STYLES, type KeyStyleName } from '../src/config/keys';
import type { SecretStore, SecretSummary } from '../src/config/keyvault';

export const FIXTURE_SETTINGS = path.join(__dirname, 'fixtures', 'settings');
export const EMPTY_SETTINGS = path.join(__dirname, 'fixtures', 'empty');

export function testSettings(overrides: {
  style?: KeyStyleName;
  settingsDir?: string;
  keyVault?: Partial<AppSettings['keyVault']>;
  credential?: Partial<AppSettings['credential']>;
} = {}): AppSettings {
  return {
    port: 0,
    nodeEnv: 'test',
    settingsDir: overrides.settingsDir ?? EMPTY_SETTINGS,
    keyStyle: KEY_STYLES[overrides.style ?? 'colon'],
    keyVault: {
      enabled: undefined,
      nameOrUrl: 'unit-vault',
      timeoutMs: 1000,
      secretNames: undefined,
      ...overrides.keyVault
    },
    credential: {
      mode: 'service-principal',
      probeTimeoutMs: 50,
      managedIdentityClientId: undefined,
      tenantId: 'test-tenant',
      clientId: 'test-client',
      clientSecret: 'test-secret',
      authConnectionString: undefined,
      ...overrides.credential
    }
  };
}

export interface FakeStoreOptions {
  disabled?: string[];
  /** never settles until aborted */
  hang?: boolean;
  listError?: unknown;
  getError?: unknown;
}

/** In-memory vault. `requested` records every getSecret call. */
export function fakeStore(secrets: Record<string, string>, opts: FakeStoreOptions = {}) {
  const requested: string[] = [];
  const hangUntilAborted = (signal?: AbortSignal) =>
    new Promise<never>((_, reject) => {
      signal?.addEventListener('abort', () => reject(Object.assign(new Error('aborted'), { name: 'AbortError' })));
    });
  const store: SecretStore = {
    url: 'https://unit-vault.vault.azure.net',
    async *listSecrets(signal) {
      if (opts.hang) await hangUntilAborted(signal);
      if (opts.listError !== undefined) throw opts.listError;
      for (const name of Object.keys(secrets)) {
        const item: SecretSummary = { name, enabled: !(opts.disabled ?? []).includes(name) };
        yield item;
      }
    },
    async getSecret(name) {
      requested.push(name);
      if (opts.getError !== undefined) throw opts.getError;
      return secrets[name];
    }
  };
  return { store, requested };
}

export const silent = () => undefined;
