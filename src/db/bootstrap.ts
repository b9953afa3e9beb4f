import { existsSync, promises as fs } from "fs";
import { fileURLToPath } from "url";
import type * as pg from "pg";

// db/ sits at the package root, two levels above src/db and three above dist/src/db.
const SCHEMA_CANDIDATES = ["../../db/schema.sql", "../../../db/schema.sql"].map((rel) =>
  fileURLToPath(new URL(rel, import.meta.url))
);

export function defaultSchemaPath(): string {
  return SCHEMA_CANDIDATES.find((p) => existsSync(p)) ?? "db/schema.sql";
}

export async function applySqlFile(pool: pg.Pool, filePath: string = defaultSchemaPath()): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}
