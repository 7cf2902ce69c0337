import { Pool } from "pg";

export const CREATE_TRANSACTIONS_TABLE = `
CREATE TABLE IF NOT EXISTS transactions (
    id SERIAL PRIMARY KEY,
    user_id BIGINT,
    category TEXT NOT NULL,
    amount DOUBLE PRECISION NOT NULL,
    currency TEXT DEFAULT 'INR',
    date DATE NOT NULL,
    description TEXT,
    tags JSONB,
    merchant TEXT,
    payment_method TEXT,
    transaction_type TEXT DEFAULT 'expense',
    is_recurring BOOLEAN DEFAULT FALSE,
    recurring_period TEXT,
    status TEXT DEFAULT 'paid',
    bill_due_date DATE,
    attachment_url TEXT,
    created_at TIMESTAMP WITH TIME ZONE DEFAULT NOW(),
    updated_at TIMESTAMP WITH TIME ZONE DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS transactions_user_date_idx ON transactions (user_id, date);
`;

export const DROP_TRANSACTIONS_TABLE = `
DROP TABLE IF EXISTS transactions;
`;

export async function initDatabase(pool: Pool) {
  await pool.query(CREATE_TRANSACTIONS_TABLE);
}
