import fs from 'fs';
import os from 'os';
import path from 'path';
import { Pool } from 'pg';
import { ensureDataDirectory, prepareDatabase } from '../bootstrap';
import { checkDatabaseHealth } from '../db/pool';
import { runMigrations } from '../db/migrate';
import { SetupException } from '../utils/exceptions';

jest.mock('../config/logger.config', () => ({
  logger: { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() },
}));

jest.mock('../db/pool', () => ({
  pool: {},
  checkDatabaseHealth: jest.fn(),
  closePool: jest.fn(),
}));

jest.mock('../db/migrate', () => ({
  runMigrations: jest.fn(),
}));

const mockHealth = checkDatabaseHealth as jest.MockedFunction<typeof checkDatabaseHealth>;
const mockMigrate = runMigrations as jest.MockedFunction<typeof runMigrations>;

describe('bootstrap', () => {
  const db = {} as unknown as Pool;

  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('ensureDataDirectory', () => {
    let root: string;

    beforeEach(() => {
      root = fs.mkdtempSync(path.join(os.tmpdir(), 'data-'));
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    it('creates a missing directory', async () => {
      const dataDir = path.join(root, 'nested', 'data');

      await ensureDataDirectory(dataDir);

      expect(fs.statSync(dataDir).isDirectory()).toBe(true);
    });

    it('accepts an existing directory', async () => {
      await expect(ensureDataDirectory(root)).resolves.toBeUndefined();
    });

    it('raises SetupException when a file is in the way', async () => {
      const blocked = path.join(root, 'file');
      fs.writeFileSync(blocked, '');

      await expect(ensureDataDirectory(path.join(blocked, 'data'))).rejects.toThrow(SetupException);
    });
  });

  describe('prepareDatabase', () => {
    it('runs migrations once the database answers', async () => {
      mockHealth.mockResolvedValue(true);
      mockMigrate.mockResolvedValue([]);

      await prepareDatabase(db);

      expect(mockMigrate).toHaveBeenCalledWith(db);
    });

    it('fails setup when the database is unreachable', async () => {
      mockHealth.mockResolvedValue(false);

      await expect(prepareDatabase(db)).rejects.toThrow('Could not connect to database');
      expect(mockMigrate).not.toHaveBeenCalled();
    });

    it('wraps migration errors in SetupException', async () => {
      mockHealth.mockResolvedValue(true);
      mockMigrate.mockRejectedValue(new Error('syntax error'));

      await expect(prepareDatabase(db)).rejects.toThrow(
        new SetupException('Failed to apply migrations: syntax error')
      );
    });
  });
});
