import http from 'http';
import request from 'supertest';
import { createApp, start } from '../src/server';
import { loadConfiguration } from '../src/config/bootstrap';
import { Configuration } from '../src/config/configuration';
import { KEY_STYLES } from '../src/config/keys';
import { DatabaseConnectionFailed, MissingConfiguration, VaultUnreachable } from '../src/utils/errors';
import { fakeStore, silent, testSettings } from './helpers';

const mockSystemUser = jest.fn();

// Mock the DB module to avoid a real SQL Server during tests
jest.mock('../src/db/pool', () => ({
  withConnection: async (_cs: string, work: (pool: unknown) => Promise<unknown>) =>
    work({
      request: () => ({
        query: async (q: string) => ({ recordset: [{ principal: mockSystemUser(q) }] })
      })
    })
}));

const CS = 'Server=db;User=u;Password=p;';

describe('GET /api/User (integration - mocked vault and DB)', () => {
  let app: ReturnType<typeof createApp>;

  beforeAll(async () => {
    const { store } = fakeStore({ 'Secrets--ConnectionString': CS });
    const { configuration } = await loadConfiguration(testSettings(), { env: {}, createStore: () => store, log: silent });
    app = createApp({ configuration });
  });

  beforeEach(() => {
    mockSystemUser.mockReset();
    mockSystemUser.mockReturnValue('u');
  });

  test('returns the vault connection string and the database principal', async () => {
    const res = await request(app).get('/api/User');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ connectionString: CS, result: 'u' });
    expect(mockSystemUser).toHaveBeenCalledWith('SELECT SYSTEM_USER AS principal');
  });

  test('route matching ignores case', async () => {
    const res = await request(app).get('/api/user');
    expect(res.status).toBe(200);
    expect(res.body.result).toBe('u');
  });

  test('health endpoints', async () => {
    expect((await request(app).get('/healthz')).body).toEqual({ status: 'ok' });
    expect((await request(app).get('/api/health')).body).toEqual({ status: 'ok' });
  });

  test('unknown routes are JSON 404s', async () => {
    const res = await request(app).get('/api/nothing');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: 'NotFound', message: 'Not found' } });
  });

  test('serves the OpenAPI document with the probe route', async () => {
    const res = await request(app).get('/openapi.json');
    expect(res.status).toBe(200);
    expect(res.body.paths['/api/User'].get.summary).toBe(
      'Open a database connection and report the authenticated principal'
    );
  });
});

describe('request-phase failures', () => {
  test('database errors surface as a 500 with the error code', async () => {
    const err = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const configuration = new Configuration([{ key: 'Secrets:ConnectionString', value: CS }], KEY_STYLES.colon);
    const app = createApp({
      configuration,
      docs: false,
      probe: async () => {
        throw new DatabaseConnectionFailed('Could not connect to Server=db;User=u: timeout');
      }
    });
    const res = await request(app).get('/api/User');
    expect(res.status).toBe(500);
    expect(res.body).toEqual({
      error: { code: 'DatabaseConnectionFailed', message: 'Could not connect to Server=db;User=u: timeout' }
    });
    err.mockRestore();
  });

  test('the dotted key style reads Secrets.ConnectionString', async () => {
    const configuration = new Configuration([{ key: 'secrets.connectionstring', value: CS }], KEY_STYLES.dotted);
    const app = createApp({ configuration, docs: false, probe: async cs => ({ connectionString: cs, result: 'dotted' }) });
    const res = await request(app).get('/api/User');
    expect(res.body).toEqual({ connectionString: CS, result: 'dotted' });
  });

  test('an app without a connection string is not built', () => {
    const configuration = new Configuration([], KEY_STYLES.colon);
    expect(() => createApp({ configuration })).toThrow(MissingConfiguration);
  });
});

describe('start', () => {
  let listen: jest.SpyInstance;
  let log: jest.SpyInstance;

  beforeEach(() => {
    listen = jest.spyOn(http.Server.prototype, 'listen');
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    listen.mockRestore();
    log.mockRestore();
  });

  test('a vault that times out aborts startup before any listener exists', async () => {
    const { store } = fakeStore({ 'Secrets--ConnectionString': CS }, { hang: true });
    await expect(
      start({ settings: testSettings({ keyVault: { timeoutMs: 20 } }), env: {}, createStore: () => store })
    ).rejects.toBeInstanceOf(VaultUnreachable);
    expect(listen).not.toHaveBeenCalled();
  });

  test('listens once the configuration is loaded', async () => {
    const { store } = fakeStore({ 'Secrets--ConnectionString': CS });
    mockSystemUser.mockReturnValue('u');
    const server = await start({ settings: testSettings(), env: {}, createStore: () => store });
    try {
      expect(listen).toHaveBeenCalledTimes(1);
      const address = server.address();
      expect(typeof address === 'object' && address !== null ? address.port : 0).toBeGreaterThan(0);
      const res = await request(server).get('/api/User');
      expect(res.body).toEqual({ connectionString: CS, result: 'u' });
    } finally {
      await new Promise<void>(resolve => server.close(() => resolve()));
    }
  });
});
