import path from 'path';
import type { AppSettings } from './env';
import {
  buildConfiguration,
  environmentEntries,
  jsonFileEntries,
  type ConfigEntry,
  type Configuration
} from './configuration';
import { resolveCredential, toTokenCredential, type Credential, type CredentialDeps } from './credential';
import { createSecretStore, loadSecrets, vaultUrl, type SecretStore } from './keyvault';
import { joinKey } from './keys';

export interface BootstrapDeps extends CredentialDeps {
  env?: NodeJS.ProcessEnv;
  /** builds the store for a resolved credential; defaults to a SecretClient */
  createStore?: (url: string, credential: Credential) => SecretStore;
}

export interface LoadedConfiguration {
  configuration: Configuration;
  credentialKind: Credential['kind'] | undefined;
  /** local keys supplied by the vault */
  vaultKeys: string[];
}

function localLayers(settings: AppSettings, env: NodeJS.ProcessEnv): ConfigEntry[][] {
  const style = settings.keyStyle;
  return [
    jsonFileEntries(path.join(settings.settingsDir, 'appsettings.json'), style),
    jsonFileEntries(path.join(settings.settingsDir, `appsettings.${settings.nodeEnv}.json`), style),
    environmentEntries(env, style)
  ];
}

// settings files ship empty placeholders
function nonBlank(value: string | undefined) {
  return value && value.trim() ? value.trim() : undefined;
}

/**
 * Startup sequence: local settings, then the vault on top of them.
 * Rejects on any credential or vault failure so nothing is served half-configured.
 */
export async function loadConfiguration(settings: AppSettings, deps: BootstrapDeps = {}): Promise<LoadedConfiguration> {
  const log = deps.log ?? ((m: string) => console.log(m));
  const layers = localLayers(settings, deps.env ?? process.env);
  const local = buildConfiguration(layers, settings.keyStyle);

  const nameOrUrl =
    settings.keyVault.nameOrUrl ??
    nonBlank(local.get(joinKey(['KeyVault', 'Url'], settings.keyStyle))) ??
    nonBlank(local.get(joinKey(['KeyVault', 'Name'], settings.keyStyle)));
  const enabled = settings.keyVault.enabled ?? Boolean(nameOrUrl);
  if (!enabled) {
    log('[keyvault] disabled; using local configuration only');
    return { configuration: local, credentialKind: undefined, vaultKeys: [] };
  }
  if (!nameOrUrl) {
    throw new Error('USE_AZURE_KEYVAULT is on but no vault is configured (AZURE_KEY_VAULT_NAME, AZURE_KEY_VAULT_URL or KeyVault:Name)');
  }

  const url = vaultUrl(nameOrUrl);
  const credential = await resolveCredential(settings.credential, deps);
  const store = (deps.createStore ?? ((u, c) => createSecretStore(u, toTokenCredential(c))))(url, credential);
  const secrets = await loadSecrets(store, {
    style: settings.keyStyle,
    timeoutMs: settings.keyVault.timeoutMs,
    secretNames: settings.keyVault.secretNames
  });
  const vaultKeys = secrets.map(s => s.key);
  log(`[keyvault] loaded ${secrets.length} secret(s) from ${url}${vaultKeys.length ? `: ${vaultKeys.join(', ')}` : ''}`);

  return {
    configuration: buildConfiguration([...layers, secrets], settings.keyStyle),
    credentialKind: credential.kind,
    vaultKeys
  };
}
