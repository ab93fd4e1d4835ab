import fs from 'fs';
import path from 'path';
import { SCHEMA_PATH, migrate } from '../../src/db';
import { FakePool, quietConsole } from '../helpers/fakes';

describe('migrate', () => {
    beforeEach(quietConsole);

    it('applies schema.sql in a single query', async () => {
        const pool = new FakePool();

        await migrate(pool);

        expect(pool.statements).toEqual([{ text: fs.readFileSync(SCHEMA_PATH, 'utf-8'), values: undefined }]);
        expect(pool.texts()[0]).toMatch(/^CREATE TABLE IF NOT EXISTS workflow_snapshots \(/);
        expect(console.log).toHaveBeenCalledWith('[db] schema applied');
    });

    it('fails without querying when the schema file is missing', async () => {
        const pool = new FakePool();

        await expect(migrate(pool, path.join(__dirname, 'missing.sql'))).rejects.toThrow(/ENOENT/);
        expect(pool.statements).toEqual([]);
    });
});
