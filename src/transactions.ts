import { Pool } from "pg";
import {
  CategoryTotalRow,
  TransactionExportRow,
  TransactionListRow,
} from "./types/database";

export type NewTransaction = {
  userId: number;
  category: string;
  amount: number;
  /** YYYY-MM-DD */
  date: string;
  description?: string | null;
  tags?: string[] | null;
  currency: string;
};

/** The part of a pg `Pool` the stores query through. */
export type Queryable = Pick<Pool, "query">;

export interface TransactionStore {
  insert(transaction: NewTransaction): Promise<number>;
  recent(userId: number, limit: number): Promise<TransactionListRow[]>;
  summary(userId: number, since: string | null): Promise<CategoryTotalRow[]>;
  exportRows(userId: number): Promise<TransactionExportRow[]>;
}

export class PgTransactionStore implements TransactionStore {
  constructor(private readonly pool: Queryable) {}

  async insert(transaction: NewTransaction): Promise<number> {
    const result = await this.pool.query<{ id: number }>(
      `INSERT INTO transactions (
          user_id, category, amount, currency, date, description, tags, created_at, updated_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, NOW(), NOW())
        RETURNING id`,
      [
        transaction.userId,
        transaction.category,
        transaction.amount,
        transaction.currency,
        transaction.date,
        transaction.description ?? null,
        transaction.tags ? JSON.stringify(transaction.tags) : null,
      ],
    );
    return result.rows[0].id;
  }

  async recent(userId: number, limit: number): Promise<TransactionListRow[]> {
    const result = await this.pool.query<TransactionListRow>(
      `
      SELECT id, category, amount, to_char(date, 'YYYY-MM-DD') AS date, description
      FROM transactions
      WHERE user_id = $1
      ORDER BY transactions.date DESC, id DESC
      LIMIT $2;
        `,
      [userId, limit],
    );
    return result.rows;
  }

  async summary(userId: number, since: string | null): Promise<CategoryTotalRow[]> {
    const result = await this.pool.query<CategoryTotalRow>(
      `
      SELECT category, SUM(amount) AS total
      FROM transactions
      WHERE user_id = $1 AND ($2::date IS NULL OR date >= $2::date)
      GROUP BY category
      ORDER BY category;
        `,
      [userId, since],
    );
    return result.rows;
  }

  async exportRows(userId: number): Promise<TransactionExportRow[]> {
    const result = await this.pool.query<TransactionExportRow>(
      `
      SELECT id, to_char(date, 'YYYY-MM-DD') AS date, category, amount, currency, description
      FROM transactions
      WHERE user_id = $1
      ORDER BY transactions.date, id;
        `,
      [userId],
    );
    return result.rows;
  }
}
