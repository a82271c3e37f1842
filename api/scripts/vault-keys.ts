import { readSettings } from '../src/config/env';
import { loadConfiguration } from '../src/config/bootstrap';
import { errorMessage } from '../src/utils/errors';

// Lists the configuration keys the vault supplies (names only, never values).
async function main() {
  const settings = readSettings();
  try {
    const { vaultKeys } = await loadConfiguration(settings, { log: () => undefined });
    for (const key of vaultKeys) console.log(key);
  } catch (e) {
    console.error(`vault-keys: ${errorMessage(e)}`);
    process.exitCode = 1;
  }
}

void main();
