import Database from "better-sqlite3";
import fs from "node:fs";
import mysql, { type RowDataPacket } from "mysql2/promise";
import pg from "pg";
import { IntakeValidationError, NotFoundError, ProbeError, errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { databaseName } from "../core/target-uri.js";

/** Answers whether the database a URI names exists on its server. */
export interface DatabaseProbe {
  exists(uri: string): Promise<boolean>;
}

type ServerAddress = {
  host: string;
  port?: number;
  user?: string;
  password?: string;
  database: string;
};

function serverAddress(url: URL, uri: string): ServerAddress {
  return {
    host: url.hostname,
    port: url.port ? Number(url.port) : undefined,
    user: url.username ? decodeURIComponent(url.username) : undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    database: databaseName(uri),
  };
}

async function mysqlExists(addr: ServerAddress): Promise<boolean> {
  const conn = await mysql.createConnection({
    host: addr.host,
    port: addr.port,
    user: addr.user,
    password: addr.password,
  });
  try {
    const [rows] = await conn.query<RowDataPacket[]>(
      "SELECT SCHEMA_NAME FROM INFORMATION_SCHEMA.SCHEMATA WHERE SCHEMA_NAME = ?",
      [addr.database],
    );
    return rows.length > 0;
  } finally {
    await conn.end();
  }
}

async function postgresExists(addr: ServerAddress): Promise<boolean> {
  const client = new pg.Client({
    host: addr.host,
    port: addr.port,
    user: addr.user,
    password: addr.password,
    database: "postgres",
  });
  await client.connect();
  try {
    const result = await client.query("SELECT 1 FROM pg_database WHERE datname = $1", [addr.database]);
    return result.rows.length > 0;
  } finally {
    await client.end();
  }
}

function sqliteExists(filePath: string): boolean {
  if (!fs.existsSync(filePath)) return false;
  const db = new Database(filePath, { readonly: true, fileMustExist: true });
  try {
    // Fails with SQLITE_NOTADB when the file is not a database.
    db.pragma("schema_version");
    return true;
  } finally {
    db.close();
  }
}

/** Picks a driver from the URI scheme: mysql, postgres(ql) or sqlite. */
export class SchemeDatabaseProbe implements DatabaseProbe {
  async exists(uri: string): Promise<boolean> {
    let url: URL;
    try {
      url = new URL(uri);
    } catch {
      throw new IntakeValidationError(`Not a database URI: ${uri}`);
    }

    switch (url.protocol) {
      case "mysql:":
        return mysqlExists(serverAddress(url, uri));
      case "postgres:":
      case "postgresql:":
        return postgresExists(serverAddress(url, uri));
      case "sqlite:": {
        // sqlite:///rel/path.db is relative to the working directory, sqlite:////abs/path.db absolute.
        const filePath = databaseName(uri);
        if (!filePath || filePath === "/") throw new IntakeValidationError(`No database file in ${uri}`);
        return sqliteExists(filePath);
      }
      default:
        throw new IntakeValidationError(`Unsupported database scheme ${url.protocol} in ${uri}`);
    }
  }
}

/**
 * Throws NotFoundError when the database is missing and ProbeError when its
 * server cannot be asked.
 */
export async function assertDatabaseExists(probe: DatabaseProbe, uri: string, logger: Logger): Promise<void> {
  let found: boolean;
  try {
    found = await probe.exists(uri);
  } catch (err) {
    if (err instanceof IntakeValidationError) throw err;
    throw new ProbeError(`Could not check ${uri}: ${errorMessage(err)}`, err);
  }

  if (!found) {
    logger.error(`[intake] ${uri} does not exist`);
    throw new NotFoundError(`${uri} does not exist`);
  }
  logger.info(`[intake] ${uri} looks good`);
}
