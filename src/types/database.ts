// Database table types (snake_case - matches database columns)
export type Transaction = {
  id: number;
  user_id: string | null;
  category: string;
  amount: number;
  currency: string | null;
  date: string;
  description: string | null;
  tags: string[] | null;
  merchant: string | null;
  payment_method: string | null;
  transaction_type: string | null;
  is_recurring: boolean | null;
  recurring_period: string | null;
  status: string | null;
  bill_due_date: string | null;
  attachment_url: string | null;
  created_at: Date | null;
  updated_at: Date | null;
};

export type TransactionListRow = Pick<
  Transaction,
  "id" | "category" | "amount" | "date" | "description"
>;

export type CategoryTotalRow = {
  category: string;
  total: number;
};

export type TransactionExportRow = Pick<
  Transaction,
  "id" | "date" | "category" | "amount" | "currency" | "description"
>;

// Row shape of the legacy SQLite `transactions` table; every column is loosely typed there.
export type LegacyTransactionRow = {
  id?: number | null;
  user_id?: number | string | null;
  category?: string | null;
  amount?: number | string | null;
  currency?: string | null;
  date?: string | null;
  description?: string | null;
  tags?: string | null;
  merchant?: string | null;
  payment_method?: string | null;
  transaction_type?: string | null;
  is_recurring?: number | boolean | null;
  recurring_period?: string | null;
  status?: string | null;
  bill_due_date?: string | null;
  attachment_url?: string | null;
  created_at?: string | null;
  updated_at?: string | null;
};
