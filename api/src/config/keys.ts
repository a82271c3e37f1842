import { KeyTranslationAmbiguous } from '../utils/errors';

/**
 * How vault secret names map onto hierarchical configuration keys.
 *
 * Key Vault names only allow letters, digits and dashes, so the nesting
 * delimiter of the configuration system is spelled with dashes remotely.
 */
export interface KeyStyle {
  name: KeyStyleName;
  remoteDelimiter: string;
  localDelimiter: string;
}

export type KeyStyleName = 'colon' | 'dotted';

export const KEY_STYLES: Readonly<Record<KeyStyleName, KeyStyle>> = Object.freeze({
  // Secrets--ConnectionString -> Secrets:ConnectionString
  colon: Object.freeze({ name: 'colon', remoteDelimiter: '--', localDelimiter: ':' }),
  // Secrets-ConnectionString -> Secrets.ConnectionString
  dotted: Object.freeze({ name: 'dotted', remoteDelimiter: '-', localDelimiter: '.' })
});

const VAULT_NAME = /^[0-9a-zA-Z-]{1,127}$/;

export function resolveKeyStyle(name: string): KeyStyle {
  const key = name.trim().toLowerCase();
  if (key === 'colon' || key === 'dotted') return KEY_STYLES[key];
  throw new Error(`Unknown key style "${name}" (expected colon or dotted)`);
}

export function toLocalKey(remoteName: string, style: KeyStyle): string {
  if (!VAULT_NAME.test(remoteName)) {
    throw new KeyTranslationAmbiguous(`"${remoteName}" is not a valid vault secret name`);
  }
  // split/join replaces left to right without overlap
  return remoteName.split(style.remoteDelimiter).join(style.localDelimiter);
}

export function toRemoteKey(localKey: string, style: KeyStyle): string {
  const remote = localKey.split(style.localDelimiter).join(style.remoteDelimiter);
  if (!VAULT_NAME.test(remote)) {
    throw new KeyTranslationAmbiguous(`"${localKey}" has no valid vault secret name`);
  }
  // a literal dash next to a delimiter (e.g. "a-:b" under colon) reads back differently
  if (toLocalKey(remote, style) !== localKey) {
    throw new KeyTranslationAmbiguous(
      `"${localKey}" does not round-trip through "${remote}" under the ${style.name} key style`
    );
  }
  return remote;
}

export function joinKey(segments: string[], style: KeyStyle): string {
  return segments.join(style.localDelimiter);
}
