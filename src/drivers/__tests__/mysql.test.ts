/**
 * Unit tests for the MySQL driver
 */

import { EventEmitter } from 'node:events';
import { describe, it, expect, vi, beforeEach } from 'vitest';

const connections: MockMysqlConnection[] = [];
let connectFailure: Error | undefined;

class MockMysqlConnection extends EventEmitter {
    query = vi.fn(async (_sql: string, _params?: unknown[]): Promise<[unknown, unknown]> => [[], []]);
    ping = vi.fn(async () => undefined);
    end = vi.fn(async () => undefined);
    destroy = vi.fn();

    constructor(readonly options: unknown) {
        super();
    }
}

async function createMockConnection(options: unknown): Promise<MockMysqlConnection> {
    if (connectFailure !== undefined) {
        const failure = connectFailure;
        connectFailure = undefined;
        throw failure;
    }
    const connection = new MockMysqlConnection(options);
    connections.push(connection);
    return connection;
}

vi.mock('mysql2/promise', () => ({
    default: {
        createConnection: (options: unknown) => createMockConnection(options)
    }
}));

vi.mock('../../utils/logger.js', async (importOriginal) => {
    const { createLoggerModuleMock } = await import('../../__tests__/mocks/logger.js');
    return createLoggerModuleMock(await importOriginal<object>());
});

import {
    MySqlDriver,
    buildConnectionOptions,
    classifyMySqlError
} from '../mysql.js';
import { MissingSchemaError } from '../faults.js';
import { createTestConfig } from '../../__tests__/mocks/config.js';

const config = createTestConfig();

function lastConnection(): MockMysqlConnection {
    const connection = connections[connections.length - 1];
    if (connection === undefined) {
        throw new Error('no connection created');
    }
    return connection;
}

const withCode = (message: string, code: string, fatal = false): Error =>
    Object.assign(new Error(message), { code, fatal });

describe('classifyMySqlError', () => {
    it('should map known error codes', () => {
        expect(classifyMySqlError(withCode('denied', 'ER_ACCESS_DENIED_ERROR'))).toBe('auth');
        expect(classifyMySqlError(withCode('unknown db', 'ER_BAD_DB_ERROR'))).toBe('schema-missing');
        expect(classifyMySqlError(withCode('plugin', 'ER_NOT_SUPPORTED_AUTH_MODE'))).toBe('protocol');
        expect(classifyMySqlError(withCode('timeout', 'ER_QUERY_TIMEOUT'))).toBe('timeout');
        expect(classifyMySqlError(withCode('lost', 'PROTOCOL_CONNECTION_LOST', true))).toBe('network');
    });

    it('should map socket codes', () => {
        expect(classifyMySqlError(withCode('refused', 'ECONNREFUSED'))).toBe('network');
        expect(classifyMySqlError(withCode('timed out', 'ETIMEDOUT'))).toBe('timeout');
    });

    it('should treat unknown fatal errors as network loss', () => {
        expect(classifyMySqlError(withCode('odd', 'ER_SOMETHING', true))).toBe('network');
    });

    it('should treat other coded errors as statement errors', () => {
        expect(classifyMySqlError(withCode('syntax', 'ER_PARSE_ERROR'))).toBe('statement');
        expect(classifyMySqlError(withCode('dup', 'ER_DUP_ENTRY'))).toBe('statement');
    });

    it('should classify a missing schema and uncoded errors', () => {
        expect(classifyMySqlError(new MissingSchemaError('shop'))).toBe('schema-missing');
        expect(classifyMySqlError(new Error('no code'))).toBe('unknown');
    });
});

describe('buildConnectionOptions', () => {
    it('should map connection settings', () => {
        expect(buildConnectionOptions(config)).toEqual({
            host: 'db.test',
            port: 3306,
            user: 'app',
            password: 'test-secret',
            database: 'shop',
            connectTimeout: 1000,
            charset: 'utf8mb4',
            supportBigNumbers: true,
            enableKeepAlive: true,
            multipleStatements: false
        });
    });

    it('should pass the CA through when TLS is verified', () => {
        const options = buildConnectionOptions(createTestConfig({
            ssl: { rejectUnauthorized: true, ca: 'test-ca' }
        }));

        expect(options.ssl).toEqual({ rejectUnauthorized: true, ca: 'test-ca' });
    });
});

describe('MySqlDriver', () => {
    const driver = new MySqlDriver();

    beforeEach(() => {
        vi.clearAllMocks();
        connections.length = 0;
    });

    it('should open one connection per call', async () => {
        await driver.connect(config);
        await driver.connect(config);

        expect(connections).toHaveLength(2);
    });

    it('should propagate connect failures unchanged', async () => {
        const denied = withCode("Access denied for user 'app'", 'ER_ACCESS_DENIED_ERROR');
        connectFailure = denied;

        await expect(driver.connect(config)).rejects.toBe(denied);
        expect(driver.classify(denied)).toBe('auth');
    });

    it('should return rows for result sets', async () => {
        const connection = await driver.connect(config);
        lastConnection().query.mockResolvedValueOnce([[{ id: 1 }, { id: 2 }], []]);

        await expect(connection.query('SELECT id FROM t WHERE a = ?', [7])).resolves.toEqual({
            rows: [{ id: 1 }, { id: 2 }],
            rowCount: 2
        });
        expect(lastConnection().query).toHaveBeenLastCalledWith('SELECT id FROM t WHERE a = ?', [7]);
    });

    it('should report affected rows for writes', async () => {
        const connection = await driver.connect(config);
        lastConnection().query.mockResolvedValueOnce([{ affectedRows: 3, insertId: 0 }, undefined]);

        await expect(connection.query('DELETE FROM t', [])).resolves.toEqual({
            rows: [],
            rowCount: 3
        });
    });

    it('should mark the connection lost on a fatal query error', async () => {
        const connection = await driver.connect(config);
        const onLost = vi.fn();
        connection.onLost(onLost);
        const lost = withCode('Connection lost: The server closed the connection.', 'PROTOCOL_CONNECTION_LOST', true);
        lastConnection().query.mockRejectedValueOnce(lost);

        await expect(connection.query('SELECT 1', [])).rejects.toBe(lost);

        expect(connection.isAlive()).toBe(false);
        expect(onLost).toHaveBeenCalledWith(lost);
    });

    it('should stay alive after a statement error', async () => {
        const connection = await driver.connect(config);
        lastConnection().query.mockRejectedValueOnce(withCode('syntax', 'ER_PARSE_ERROR'));

        await expect(connection.query('SELEC 1', [])).rejects.toThrow('syntax');
        expect(connection.isAlive()).toBe(true);
    });

    it('should notify lost listeners once on transport events', async () => {
        const connection = await driver.connect(config);
        const onLost = vi.fn();
        connection.onLost(onLost);

        lastConnection().emit('error', withCode('reset', 'ECONNRESET', true));
        lastConnection().emit('end');

        expect(onLost).toHaveBeenCalledTimes(1);
    });

    it('should ping, close and destroy through the client', async () => {
        const connection = await driver.connect(config);

        await connection.ping();
        expect(lastConnection().ping).toHaveBeenCalledTimes(1);

        await connection.close();
        expect(lastConnection().end).toHaveBeenCalledTimes(1);
        expect(connection.isAlive()).toBe(false);

        connection.destroy();
        expect(lastConnection().destroy).toHaveBeenCalledTimes(1);
    });
});
