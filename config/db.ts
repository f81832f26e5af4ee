import dotenv from "dotenv";
import type {
  Pool,
  PoolConnection,
  PoolOptions,
  RowDataPacket,
  ResultSetHeader,
  FieldPacket,
  SslOptions,
} from "mysql2/promise";
import type { DBParams } from "../types/db";
import { DatabaseUnavailableError } from "../utils/errors";

dotenv.config();

const {
  DB_RETRY_BACKOFF_MS = 2000,
  SKIP_DB_ON_START = "false",
  DB_SSL = "false",
  DB_SSL_REJECT_UNAUTHORIZED = "false",
} = process.env;

let pool: Pool | null = null;
let connecting = false;
let attempts = 0;

// HOST switching helpers
const initialHost = process.env.DB_HOST || "127.0.0.1";
const LOCAL_FALLBACK_HOST = process.env.DB_HOST_LOCAL || "127.0.0.1";
let currentHost = initialHost;
let switchedToLocal = false;

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "PROTOCOL_CONNECTION_LOST",
  "ETIMEDOUT",
  "EPIPE",
  "PROTOCOL_ENQUEUE_AFTER_FATAL_ERROR",
]);

function isDbAvailable(): boolean {
  return !!pool;
}

const errorCode = (err: unknown): string =>
  err && typeof err === "object" && "code" in err ? String(err.code) : "";

const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

const sqlPreview = (sql: string): string =>
  sql.trim().split(/\s+/).slice(0, 6).join(" ");

async function tryConnectOnce(): Promise<boolean> {
  try {
    const mysql = await import("mysql2/promise");

    // pick connection params depending on whether we've switched to the local fallback
    const usingLocal = currentHost === LOCAL_FALLBACK_HOST;
    const host = currentHost;
    const port = Number(
      usingLocal
        ? process.env.DB_PORT_LOCAL || process.env.DB_PORT || 3306
        : process.env.DB_PORT || 3306,
    );
    const user = usingLocal
      ? process.env.DB_USER_LOCAL || process.env.DB_USER
      : process.env.DB_USER;
    const password = usingLocal
      ? process.env.DB_PASS_LOCAL || process.env.DB_PASS
      : process.env.DB_PASS;
    const database = usingLocal
      ? process.env.DB_NAME_LOCAL || process.env.DB_NAME
      : process.env.DB_NAME;

    if (!database) {
      throw new Error(
        "Database name not configured (DB_NAME or DB_NAME_LOCAL missing)",
      );
    }

    const ssl: string | SslOptions | undefined =
      DB_SSL === "true" || DB_SSL === "1"
        ? { rejectUnauthorized: DB_SSL_REJECT_UNAUTHORIZED === "true" }
        : undefined;

    const poolOptions: PoolOptions = {
      host,
      port,
      user,
      password,
      database,
      waitForConnections: true,
      connectionLimit: 10,
      queueLimit: 0,
      connectTimeout: Number(process.env.DB_CONNECT_TIMEOUT_MS || 10000),
      // DATETIME columns hold UTC
      timezone: "Z",
      ssl,
    };

    pool = mysql.createPool(poolOptions);

    // quick smoke test
    await pool.query("SELECT 1");

    attempts = 0;
    console.log(
      "DB connected:",
      `${host}:${port}`,
      `(localFallback=${usingLocal})`,
    );
    return true;
  } catch (err) {
    attempts += 1;
    const failed = pool;
    pool = null;
    if (failed) {
      await failed.end().catch((endErr: unknown) => {
        console.warn("DB pool close after failed connect:", errorMessage(endErr));
      });
    }
    console.warn(
      `DB connect attempt ${attempts} to ${currentHost} failed:`,
      errorMessage(err),
    );
    return false;
  }
}

// mysql2 returns [rows, fields] tuples
type QueryResult<T extends RowDataPacket[] | ResultSetHeader> = [
  T,
  FieldPacket[],
];

const sleep = (ms: number): Promise<void> =>
  new Promise((r) => setTimeout(r, ms));

/**
 * Run a statement on the pool, failing fast when it hangs and retrying
 * connection-level failures with exponential backoff.
 */
async function queryWithTimeout<
  T extends RowDataPacket[] | ResultSetHeader = RowDataPacket[],
>(
  sql: string,
  params: DBParams = [],
  timeoutMs: number = 8000,
  maxRetries: number = 2,
): Promise<QueryResult<T>> {
  for (let attempt = 0; ; attempt++) {
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;
    try {
      const poolRef = await getPool();
      if (!poolRef) throw new DatabaseUnavailableError();

      const p = poolRef.execute<T>(sql, params);
      const timeout = new Promise<never>((_, rej) => {
        timer = setTimeout(
          () => rej(new Error(`DB query timed out after ${timeoutMs}ms`)),
          timeoutMs,
        );
      });
      const result = await Promise.race([p, timeout]);

      console.info(
        `[DB] query OK (${Date.now() - start}ms) sql=${sqlPreview(
          sql,
        )} paramsLen=${params.length}`,
      );
      return result;
    } catch (err) {
      const code = errorCode(err);
      console.warn(
        `[DB] query ERR (${Date.now() - start}ms) sql=${sqlPreview(
          sql,
        )} err=${errorMessage(err)}`,
      );

      if (attempt < maxRetries && TRANSIENT_CODES.has(code)) {
        const backoff = 200 * Math.pow(2, attempt);
        console.info(
          `[DB] transient error ${code} - retrying attempt ${
            attempt + 1
          } after ${backoff}ms`,
        );
        await sleep(backoff);
        continue;
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}

async function connectLoop(): Promise<void> {
  if (connecting) return;
  connecting = true;
  console.log("Starting DB connect loop (initial host):", initialHost);

  while (!pool) {
    const ok = await tryConnectOnce();
    if (ok) break;

    // If we have not yet switched to local fallback and we've tried 3 times, switch.
    if (
      !switchedToLocal &&
      initialHost !== LOCAL_FALLBACK_HOST &&
      attempts >= 3
    ) {
      console.warn(
        `Failed to connect to remote DB at ${initialHost} after ${attempts} attempts. Switching to local DB host ${LOCAL_FALLBACK_HOST}`,
      );
      currentHost = LOCAL_FALLBACK_HOST;
      switchedToLocal = true;
      attempts = 0;
      continue;
    }

    if (SKIP_DB_ON_START === "true" && attempts > 0) {
      console.warn(
        "SKIP_DB_ON_START=true - continuing without DB. Will still retry in background.",
      );
      break;
    }

    const backoff = Math.min(
      Number(DB_RETRY_BACKOFF_MS) * Math.max(1, attempts),
      60_000,
    );
    await sleep(backoff);
  }
  connecting = false;

  // If we are not connected, keep trying in background periodically
  if (!pool) {
    const retry = setInterval(
      () => {
        if (pool) {
          clearInterval(retry);
          return;
        }
        tryConnectOnce().catch((err: unknown) => {
          console.error("DB background reconnect error:", errorMessage(err));
        });
      },
      Math.max(5000, Number(DB_RETRY_BACKOFF_MS)),
    );
    retry.unref();
  }
}

// public helpers
async function getPool(): Promise<Pool | null> {
  if (pool) return pool;
  await tryConnectOnce();
  return pool;
}

async function query<
  T extends RowDataPacket[] | ResultSetHeader = RowDataPacket[],
>(sql: string, params: DBParams = []): Promise<QueryResult<T>> {
  return queryWithTimeout<T>(sql, params);
}

/**
 * Run `work` on one connection inside BEGIN/COMMIT.
 * Any rejection rolls the transaction back and is rethrown.
 */
async function withTransaction<T>(
  work: (conn: PoolConnection) => Promise<T>,
): Promise<T> {
  const poolRef = await getPool();
  if (!poolRef) throw new DatabaseUnavailableError();

  const conn = await poolRef.getConnection();
  const start = Date.now();
  try {
    await conn.beginTransaction();
    const result = await work(conn);
    await conn.commit();
    console.info(`[DB] transaction COMMIT (${Date.now() - start}ms)`);
    return result;
  } catch (err) {
    try {
      await conn.rollback();
      console.warn(
        `[DB] transaction ROLLBACK (${Date.now() - start}ms) err=${errorMessage(err)}`,
      );
    } catch (rollbackErr) {
      console.error("[DB] rollback failed:", errorMessage(rollbackErr));
    }
    throw err;
  } finally {
    conn.release();
  }
}

function startDb(): void {
  connectLoop().catch((err: unknown) => {
    console.error("DB connect loop error:", errorMessage(err));
  });
}

async function closeDb(): Promise<void> {
  const current = pool;
  pool = null;
  if (current) await current.end();
}

export default {
  startDb,
  closeDb,
  query,
  withTransaction,
  isDbAvailable,
};
