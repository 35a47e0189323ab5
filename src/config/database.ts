import mysql, { Pool, PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { config } from './env';

export type SqlValue = string | number | boolean | Date | null | SqlValue[];

export type Row = Record<string, unknown>;

export interface WriteResult {
  insertId: number;
  affectedRows: number;
}

export interface Queryable {
  select(sql: string, params?: SqlValue[]): Promise<Row[]>;
  run(sql: string, params?: SqlValue[]): Promise<WriteResult>;
}

export interface Database extends Queryable {
  transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
}

// Create pool configuration with only valid mysql2 options
const poolConfig = {
  host: config.db.host,
  user: config.db.user,
  password: config.db.password,
  database: config.db.database,
  port: config.db.port,

  waitForConnections: true,
  connectionLimit: 10,
  queueLimit: 0,

  ...(config.db.ssl && {
    ssl: {
      rejectUnauthorized: false
    }
  })
};

export const pool: Pool = mysql.createPool(poolConfig);

// `query` rather than `execute`: LIMIT placeholders and bulk `VALUES ?` only work client-side
const wrap = (target: Pool | PoolConnection): Queryable => ({
  async select(sql, params = []) {
    const [rows] = await target.query<RowDataPacket[]>(sql, params);
    return rows;
  },

  async run(sql, params = []) {
    const [result] = await target.query<ResultSetHeader>(sql, params);
    return { insertId: result.insertId, affectedRows: result.affectedRows };
  }
});

export const db: Database = {
  ...wrap(pool),

  async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
    const connection = await pool.getConnection();
    try {
      await connection.beginTransaction();
      const result = await work(wrap(connection));
      await connection.commit();
      return result;
    } catch (error) {
      await connection.rollback();
      throw error;
    } finally {
      connection.release();
    }
  }
};
