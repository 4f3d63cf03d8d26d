/**
 * PostgreSQL client for the db result store. The pool is created on first
 * use from DATABASE_URL and shared until closeDb().
 */

import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import pg from "pg";
import { PersistenceError } from "../errors.js";
import * as schema from "./schema.js";

export type Db = NodePgDatabase<typeof schema>;

export type DbTx = Parameters<Parameters<Db["transaction"]>[0]>[0];

let pool: pg.Pool | null = null;
let db: Db | null = null;

export function getDb(): Db {
  if (db) return db;
  const url = process.env.DATABASE_URL;
  if (!url) {
    throw new PersistenceError("DATABASE_URL is required when PERSISTENCE_DRIVER=db");
  }
  pool = new pg.Pool({ connectionString: url });
  db = drizzle(pool, { schema });
  return db;
}

export async function closeDb(): Promise<void> {
  const p = pool;
  pool = null;
  db = null;
  if (p) await p.end();
}
