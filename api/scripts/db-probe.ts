import { readSettings } from '../src/config/env';
import { loadConfiguration } from '../src/config/bootstrap';
import { connectionStringKey } from '../src/server';
import { describeConnection } from '../src/db/pool';
import { probeConnection } from '../src/services/connectionProbe';
import { errorMessage } from '../src/utils/errors';

// Runs the startup sequence and the /api/User probe once, without an HTTP listener.
async function main() {
  const settings = readSettings();
  let target = '';
  try {
    const { configuration, credentialKind } = await loadConfiguration(settings);
    const connectionString = configuration.getRequired(connectionStringKey(configuration));
    target = describeConnection(connectionString);
    const { result } = await probeConnection(connectionString);
    console.log(JSON.stringify({ status: 'ok', principal: result, target, credential: credentialKind ?? 'none' }, null, 2));
    process.exit(0);
  } catch (e) {
    const code = e instanceof Error ? e.name : 'Error';
    console.error(JSON.stringify({ status: 'error', code, message: errorMessage(e), target }, null, 2));
    process.exit(1);
  }
}

void main();
