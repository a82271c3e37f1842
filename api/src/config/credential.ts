import { ClientSecretCredential, ManagedIdentityCredential, type TokenCredential } from '@azure/identity';
import type { AppSettings } from './env';
import { CredentialUnavailable, errorMessage } from '../utils/errors';

export const KEY_VAULT_SCOPE = 'https://vault.azure.net/.default';

export type Credential =
  | { readonly kind: 'managed-identity'; readonly clientId?: string }
  | {
      readonly kind: 'service-principal';
      readonly tenantId: string;
      readonly clientId: string;
      readonly clientSecret: string;
    };

type ServicePrincipal = Extract<Credential, { kind: 'service-principal' }>;

export interface CredentialDeps {
  /** Resolves when the ambient identity can issue a Key Vault token, rejects otherwise. */
  probeManagedIdentity?: (clientId: string | undefined, timeoutMs: number) => Promise<void>;
  log?: (message: string) => void;
}

export function toTokenCredential(credential: Credential): TokenCredential {
  if (credential.kind === 'managed-identity') {
    return credential.clientId
      ? new ManagedIdentityCredential({ clientId: credential.clientId })
      : new ManagedIdentityCredential();
  }
  return new ClientSecretCredential(credential.tenantId, credential.clientId, credential.clientSecret);
}

export async function probeManagedIdentity(clientId: string | undefined, timeoutMs: number): Promise<void> {
  const credential = toTokenCredential({ kind: 'managed-identity', clientId });
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`managed identity endpoint did not answer within ${timeoutMs}ms`));
    }, timeoutMs);
  });
  try {
    const token = await Promise.race([credential.getToken(KEY_VAULT_SCOPE, { abortSignal: controller.signal }), timeout]);
    if (!token?.token) throw new Error('managed identity returned no token');
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Parses the composite `AzureServicesAuthConnectionString` format,
 * e.g. `RunAs=App;AppId=<client id>;TenantId=<tenant>;AppKey=<secret>`.
 */
export function parseAuthConnectionString(value: string): Credential | undefined {
  const parts = new Map<string, string>();
  for (const segment of value.split(';')) {
    const eq = segment.indexOf('=');
    if (eq <= 0) continue;
    parts.set(segment.slice(0, eq).trim().toLowerCase(), segment.slice(eq + 1).trim());
  }
  const runAs = parts.get('runas')?.toLowerCase();
  if (runAs !== 'app') return undefined;
  const clientId = parts.get('appid');
  const tenantId = parts.get('tenantid');
  const clientSecret = parts.get('appkey');
  // RunAs=App without AppId means the ambient identity
  if (!clientId) return { kind: 'managed-identity' };
  if (!tenantId || !clientSecret) return undefined;
  return { kind: 'service-principal', tenantId, clientId, clientSecret };
}

function servicePrincipalFrom(settings: AppSettings['credential']): ServicePrincipal | undefined {
  const { tenantId, clientId, clientSecret } = settings;
  if (tenantId && clientId && clientSecret) {
    return { kind: 'service-principal', tenantId, clientId, clientSecret };
  }
  if (settings.authConnectionString) {
    const parsed = parseAuthConnectionString(settings.authConnectionString);
    if (parsed?.kind === 'service-principal') return parsed;
  }
  return undefined;
}

export async function resolveCredential(
  settings: AppSettings['credential'],
  deps: CredentialDeps = {}
): Promise<Credential> {
  const log = deps.log ?? ((m: string) => console.log(m));
  const probe = deps.probeManagedIdentity ?? probeManagedIdentity;
  // a user-assigned identity is named by MI_CLIENT_ID, or AZURE_CLIENT_ID when no secret accompanies it
  const miClientId = settings.managedIdentityClientId ?? (settings.clientSecret ? undefined : settings.clientId);

  if (settings.mode === 'managed-identity') {
    log(`[credential] using managed identity (forced)${miClientId ? ` clientId=${miClientId}` : ''}`);
    return Object.freeze({ kind: 'managed-identity', clientId: miClientId });
  }

  if (settings.mode === 'auto') {
    try {
      await probe(miClientId, settings.probeTimeoutMs);
      log(`[credential] using managed identity${miClientId ? ` clientId=${miClientId}` : ''}`);
      return Object.freeze({ kind: 'managed-identity', clientId: miClientId });
    } catch (e) {
      log(`[credential] managed identity unavailable (${errorMessage(e)}); trying service principal`);
    }
  }

  const sp = servicePrincipalFrom(settings);
  if (!sp) {
    throw new CredentialUnavailable(
      settings.mode === 'auto'
        ? 'No managed identity reachable and no service principal configured (AZURE_TENANT_ID, AZURE_CLIENT_ID, AZURE_CLIENT_SECRET or AzureServicesAuthConnectionString)'
        : 'CREDENTIAL_MODE=service-principal but neither AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET nor AzureServicesAuthConnectionString (RunAs=App;AppId=...;TenantId=...;AppKey=...) is set'
    );
  }
  log(`[credential] using service principal clientId=${sp.clientId} tenantId=${sp.tenantId}`);
  return Object.freeze(sp);
}
