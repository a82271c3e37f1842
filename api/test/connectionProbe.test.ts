import { ConnectionPool } from 'mssql';
import { PRINCIPAL_QUERY, probeConnection } from '../src/services/connectionProbe';
import { describeConnection } from '../src/db/pool';
import { DatabaseConnectionFailed, QueryFailed } from '../src/utils/errors';

const mockConnect = jest.fn();
const mockClose = jest.fn();
const mockQuery = jest.fn();

jest.mock('mssql', () => ({
  ConnectionPool: jest.fn().mockImplementation(() => ({
    connect: mockConnect,
    close: mockClose,
    request: () => ({ query: mockQuery })
  }))
}));

const CS = 'Server=db;User=u;Password=p;';

describe('probeConnection', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    mockConnect.mockResolvedValue(undefined);
    mockClose.mockResolvedValue(undefined);
  });

  test('returns the connection string and SYSTEM_USER, then closes', async () => {
    mockQuery.mockResolvedValue({ recordset: [{ principal: 'u' }] });
    await expect(probeConnection(CS)).resolves.toEqual({ connectionString: CS, result: 'u' });
    expect(ConnectionPool).toHaveBeenCalledWith(CS);
    expect(mockQuery).toHaveBeenCalledWith(PRINCIPAL_QUERY);
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('a failed connect is DatabaseConnectionFailed without the password', async () => {
    mockConnect.mockRejectedValue(new Error('Login failed for user u'));
    const probe = probeConnection(CS);
    await expect(probe).rejects.toBeInstanceOf(DatabaseConnectionFailed);
    await expect(probe).rejects.toThrow('Could not connect to Server=db;User=u: Login failed for user u');
    expect(mockQuery).not.toHaveBeenCalled();
  });

  test('a failed query is QueryFailed and the connection is still closed', async () => {
    mockQuery.mockRejectedValue(new Error('permission denied'));
    const probe = probeConnection(CS);
    await expect(probe).rejects.toBeInstanceOf(QueryFailed);
    await expect(probe).rejects.toThrow('SELECT SYSTEM_USER AS principal failed: permission denied');
    expect(mockClose).toHaveBeenCalledTimes(1);
  });

  test('no rows is QueryFailed', async () => {
    mockQuery.mockResolvedValue({ recordset: [] });
    await expect(probeConnection(CS)).rejects.toThrow('SELECT SYSTEM_USER AS principal failed: query returned no rows');
  });

  test('a failing close does not hide the result', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    mockQuery.mockResolvedValue({ recordset: [{ principal: 'u' }] });
    mockClose.mockRejectedValue(new Error('already closed'));
    await expect(probeConnection(CS)).resolves.toEqual({ connectionString: CS, result: 'u' });
    expect(warn).toHaveBeenCalledWith('[db] close failed:', 'already closed');
    warn.mockRestore();
  });
});

describe('describeConnection', () => {
  test('keeps only non-secret parts', () => {
    expect(describeConnection('Data Source=tcp:db,1433; Initial Catalog=app; User ID=u; Password=p; Encrypt=true')).toBe(
      'Data Source=tcp:db,1433;Initial Catalog=app;User ID=u'
    );
  });
});
