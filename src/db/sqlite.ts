import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

type BetterSqliteDb = Database.Database;

const IN_MEMORY_DATABASE = ':memory:';

function resolveSchemaPath(): string {
  const candidates = [
    path.resolve(__dirname, 'schema.sql'),
    path.resolve(process.cwd(), 'src/db/schema.sql'),
  ];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }

  throw new Error('schema.sql not found');
}

export class SqliteDatabase {
  readonly db: BetterSqliteDb;

  constructor() {
    this.db = new Database(IN_MEMORY_DATABASE);
    this.migrate();
  }

  private migrate(): void {
    const schemaPath = resolveSchemaPath();
    const schemaSql = fs.readFileSync(schemaPath, 'utf8');
    this.db.exec(schemaSql);
  }

  close(): void {
    this.db.close();
  }
}

export type { BetterSqliteDb };
