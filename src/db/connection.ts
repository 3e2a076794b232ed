import initSqlJs from 'sql.js';
import type { Database } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';

/**
 * sql.js database persisted to a single file. Each write is flushed to disk
 * with {@link RunDatabase.save}.
 */
export class RunDatabase {
    private constructor(readonly db: Database, readonly filePath: string) {}

    static async open(filePath: string): Promise<RunDatabase> {
        const SQL = await initSqlJs();

        // Ensure data directory exists
        const dataDir = path.dirname(filePath);
        if (!fs.existsSync(dataDir)) {
            fs.mkdirSync(dataDir, { recursive: true });
        }

        let db: Database;
        if (fs.existsSync(filePath)) {
            db = new SQL.Database(fs.readFileSync(filePath));
        } else {
            db = new SQL.Database();
        }
        initializeSchema(db);

        return new RunDatabase(db, filePath);
    }

    save(): void {
        const data = this.db.export();
        fs.writeFileSync(this.filePath, Buffer.from(data));
    }

    close(): void {
        this.save();
        this.db.close();
    }
}

function initializeSchema(database: Database): void {
    database.run(`
    CREATE TABLE IF NOT EXISTS import_runs (
      id TEXT PRIMARY KEY,
      run_key TEXT NOT NULL,
      source_file TEXT NOT NULL,
      invoice_number TEXT,
      vendor_name TEXT,
      total_amount REAL,
      status TEXT NOT NULL,
      json_file TEXT NOT NULL,
      xml_file TEXT,
      steps TEXT NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

    database.run(`CREATE INDEX IF NOT EXISTS idx_import_runs_created ON import_runs(created_at)`);
}
