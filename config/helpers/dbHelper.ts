import type {
  PoolConnection,
  RowDataPacket,
  ResultSetHeader,
} from "mysql2/promise";
import type { DBParams, DBParam } from "../../types/db";
import db from "../db";

/**
 * Executes one statement and resolves with its rows (or header for writes).
 * Bound either to the shared pool or to one transaction's connection.
 */
export type SqlRunner = <
  T extends RowDataPacket[] | ResultSetHeader = RowDataPacket[],
>(
  sql: string,
  params?: DBParams
) => Promise<T>;

/**
 * Basic identifier validator to avoid SQL injection via field/table names.
 * Only allows letters, numbers and underscores.
 */
function validateIdentifier(name: string): void {
  if (!/^[a-zA-Z0-9_]+$/.test(name)) {
    throw new Error(`Invalid identifier: ${name}`);
  }
}

const sqlPreview = (sql: string): string =>
  sql.trim().split(/\s+/).slice(0, 6).join(" ");

/** Runner on the shared pool (timeouts and transient retries included). */
export const poolRunner: SqlRunner = async <
  T extends RowDataPacket[] | ResultSetHeader = RowDataPacket[],
>(
  sql: string,
  params: DBParams = []
): Promise<T> => {
  const [rows] = await db.query<T>(sql, params);
  return rows;
};

/** Runner on a transaction's connection; fails fast if a statement hangs. */
export function connectionRunner(
  conn: PoolConnection,
  timeoutMs: number = 8000
): SqlRunner {
  return async <T extends RowDataPacket[] | ResultSetHeader = RowDataPacket[]>(
    sql: string,
    params: DBParams = []
  ): Promise<T> => {
    const start = Date.now();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, rej) => {
      timer = setTimeout(
        () => rej(new Error(`DB query timed out after ${timeoutMs}ms`)),
        timeoutMs
      );
    });
    try {
      const [rows] = await Promise.race([conn.execute<T>(sql, params), timeout]);
      console.info(
        `[DB] tx query OK (${Date.now() - start}ms) sql=${sqlPreview(
          sql
        )} paramsLen=${params.length}`
      );
      return rows;
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      console.warn(
        `[DB] tx query ERR (${Date.now() - start}ms) sql=${sqlPreview(
          sql
        )} err=${msg}`
      );
      throw err;
    } finally {
      clearTimeout(timer);
    }
  };
}

/**
 * Inserts a record into a table. Returns insertId.
 * With `ignoreDuplicates` a unique-key clash is skipped and insertId is 0.
 */
export async function insertRecord(
  run: SqlRunner,
  table: string,
  data: Record<string, DBParam>,
  { ignoreDuplicates = false }: { ignoreDuplicates?: boolean } = {}
): Promise<number> {
  validateIdentifier(table);
  const fields = Object.keys(data);
  fields.forEach(validateIdentifier);
  const values = Object.values(data);
  const placeholders = fields.map(() => "?").join(", ");
  const verb = ignoreDuplicates ? "INSERT IGNORE" : "INSERT";
  const sql = `${verb} INTO \`${table}\` (${fields.join(
    ", "
  )}) VALUES (${placeholders})`;
  const result = await run<ResultSetHeader>(sql, values);
  return result.insertId ?? 0;
}

/**
 * Updates records in a table based on conditions. Returns affectedRows.
 */
export async function updateRecord(
  run: SqlRunner,
  table: string,
  updates: Record<string, DBParam>,
  conditions: Record<string, DBParam>
): Promise<number> {
  validateIdentifier(table);
  const updateFields = Object.keys(updates);
  updateFields.forEach(validateIdentifier);
  const whereFields = Object.keys(conditions);
  whereFields.forEach(validateIdentifier);

  const updateClause = updateFields.map((f) => `${f} = ?`).join(", ");
  const whereClause = whereFields.map((f) => `${f} = ?`).join(" AND ");

  const sql = `UPDATE \`${table}\` SET ${updateClause} WHERE ${whereClause}`;
  const params = [...Object.values(updates), ...Object.values(conditions)];

  const result = await run<ResultSetHeader>(sql, params);
  return result.affectedRows ?? 0;
}

/** `?, ?, ?` for an IN list. */
export const placeholders = (count: number): string =>
  Array.from({ length: count }, () => "?").join(", ");

/**
 * Promisified DB query helper for reuse across the project. Returns rows only.
 */
export async function queryAsync<T extends RowDataPacket = RowDataPacket>(
  sql: string,
  params: DBParams = []
): Promise<T[]> {
  return poolRunner<T[]>(sql, params);
}
