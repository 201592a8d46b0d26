/**
 * Bookkeeping tables, created on start when missing
 */
export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company TEXT NOT NULL,
    name TEXT,
    vat_number TEXT,
    country_code TEXT NOT NULL DEFAULT 'BE',
    street TEXT,
    city TEXT,
    postal_code TEXT,
    peppol_id TEXT,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    from_user_id INTEGER NOT NULL REFERENCES users(id),
    to_user_id INTEGER NOT NULL REFERENCES users(id),
    value REAL NOT NULL,
    vat REAL NOT NULL DEFAULT 0,
    vat_recovery REAL NOT NULL DEFAULT 1,
    currency TEXT NOT NULL DEFAULT 'EUR',
    start_date TEXT NOT NULL,
    end_date TEXT,
    intervat INTEGER NOT NULL DEFAULT 0,
    annotation TEXT,
    proof TEXT,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS invoices (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    external_id TEXT NOT NULL,
    peppol_message_id TEXT UNIQUE,
    direction TEXT NOT NULL CHECK(direction IN ('outgoing', 'incoming')),
    supplier_id INTEGER NOT NULL REFERENCES users(id),
    buyer_id INTEGER NOT NULL REFERENCES users(id),
    issue_date TEXT NOT NULL,
    currency TEXT NOT NULL DEFAULT 'EUR',
    total_amount REAL NOT NULL,
    vat_amount REAL NOT NULL,
    transaction_id INTEGER REFERENCES transactions(id),
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_users_company ON users(company);
  CREATE INDEX IF NOT EXISTS idx_invoices_direction ON invoices(direction);
`;
