import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { resolveKeyStyle, type KeyStyle } from './keys';

// Load env from current working directory first (default behavior)
dotenv.config();
// Also attempt to load from common fallbacks so root .env works in dev and dist
const candidates = [
  path.resolve(__dirname, '../../.env'), // src/config -> api/.env
  path.resolve(__dirname, '../../../.env'), // src/config -> project root
];
for (const p of candidates) {
  if (fs.existsSync(p)) {
    // never override variables set explicitly on the command line
    dotenv.config({ path: p });
  }
}

const flag = z
  .string()
  .optional()
  .transform(v => (v === undefined ? undefined : ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase())));

const blankToUndefined = z
  .string()
  .optional()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

// blank falls back to the default, like Number(process.env.PORT || 4001)
const positiveInt = (d: number) => blankToUndefined.pipe(z.coerce.number().int().positive().default(d));

const EnvSchema = z.object({
  PORT: positiveInt(4001),
  NODE_ENV: z.string().default('development'),
  SETTINGS_DIR: blankToUndefined,
  USE_AZURE_KEYVAULT: flag,
  AZURE_KEY_VAULT_NAME: blankToUndefined,
  KEY_VAULT_NAME: blankToUndefined,
  AZURE_KEY_VAULT_URL: blankToUndefined,
  KEY_VAULT_KEY_STYLE: z.enum(['colon', 'dotted']).default('colon'),
  KEY_VAULT_TIMEOUT_MS: positiveInt(30000),
  KEY_VAULT_SECRET_NAMES: blankToUndefined,
  CREDENTIAL_MODE: z.enum(['auto', 'managed-identity', 'service-principal']).default('auto'),
  MI_PROBE_TIMEOUT_MS: positiveInt(3000),
  MI_CLIENT_ID: blankToUndefined,
  AZURE_TENANT_ID: blankToUndefined,
  AZURE_CLIENT_ID: blankToUndefined,
  AZURE_CLIENT_SECRET: blankToUndefined,
  AzureServicesAuthConnectionString: blankToUndefined
});

export type CredentialMode = 'auto' | 'managed-identity' | 'service-principal';

export interface AppSettings {
  port: number;
  nodeEnv: string;
  settingsDir: string;
  keyStyle: KeyStyle;
  keyVault: {
    /** undefined: enabled whenever a vault name or url is configured */
    enabled: boolean | undefined;
    nameOrUrl: string | undefined;
    timeoutMs: number;
    secretNames: string[] | undefined;
  };
  credential: {
    mode: CredentialMode;
    probeTimeoutMs: number;
    managedIdentityClientId: string | undefined;
    tenantId: string | undefined;
    clientId: string | undefined;
    clientSecret: string | undefined;
    authConnectionString: string | undefined;
  };
}

function defaultSettingsDir() {
  const local = [path.resolve(process.cwd(), 'api', 'config'), path.resolve(__dirname, '../../config')];
  return local.find(p => fs.existsSync(p)) ?? local[0];
}

/** Parses process settings once; the result is frozen and passed around explicitly. */
export function readSettings(source: NodeJS.ProcessEnv = process.env): AppSettings {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid environment: ${issues.join('; ')}`);
  }
  const e = parsed.data;
  const secretNames = e.KEY_VAULT_SECRET_NAMES?.split(',').map(s => s.trim()).filter(Boolean);
  return deepFreeze({
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    settingsDir: e.SETTINGS_DIR ?? defaultSettingsDir(),
    keyStyle: resolveKeyStyle(e.KEY_VAULT_KEY_STYLE),
    keyVault: {
      enabled: e.USE_AZURE_KEYVAULT,
      nameOrUrl: e.AZURE_KEY_VAULT_URL ?? e.AZURE_KEY_VAULT_NAME ?? e.KEY_VAULT_NAME,
      timeoutMs: e.KEY_VAULT_TIMEOUT_MS,
      secretNames: secretNames && secretNames.length ? secretNames : undefined
    },
    credential: {
      mode: e.CREDENTIAL_MODE,
      probeTimeoutMs: e.MI_PROBE_TIMEOUT_MS,
      managedIdentityClientId: e.MI_CLIENT_ID,
      tenantId: e.AZURE_TENANT_ID,
      clientId: e.AZURE_CLIENT_ID,
      clientSecret: e.AZURE_CLIENT_SECRET,
      authConnectionString: e.AzureServicesAuthConnectionString
    }
  });
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}
