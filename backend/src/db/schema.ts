import Database from "better-sqlite3";
import fs from "fs";
import path from "path";
import { bigintReplacer } from "../../../sdk/core/src";

export type Db = Database.Database;

/** Open (and migrate) the database; pass ":memory:" for a throwaway one. */
export function openDb(dbPath: string): Db {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  initSchema(db);
  return db;
}

function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_type TEXT NOT NULL,
      sale_index INTEGER,
      data TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type);
    CREATE INDEX IF NOT EXISTS idx_events_sale ON events(sale_index);

    CREATE TABLE IF NOT EXISTS purchases (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      sale_index INTEGER NOT NULL,
      buyer TEXT NOT NULL,
      amount_bought TEXT NOT NULL,
      price_in_usd TEXT NOT NULL,
      usd_cost TEXT NOT NULL,
      native_sent TEXT NOT NULL,
      referral_code TEXT NOT NULL,
      timestamp INTEGER NOT NULL,
      created_at TEXT DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_purchases_sale ON purchases(sale_index);
    CREATE INDEX IF NOT EXISTS idx_purchases_buyer ON purchases(buyer);
    CREATE INDEX IF NOT EXISTS idx_purchases_referral ON purchases(referral_code);

    CREATE TABLE IF NOT EXISTS webhooks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      url TEXT NOT NULL,
      events TEXT NOT NULL,
      active INTEGER NOT NULL DEFAULT 1,
      secret TEXT,
      created_at TEXT DEFAULT (datetime('now'))
    );
  `);
}

// ── Events ────────────────────────────────────────────────────────────

interface EventRow {
  id: number;
  event_type: string;
  sale_index: number | null;
  data: string;
  timestamp: number;
}

export interface RecordedEvent {
  id: number;
  type: string;
  sale: number | null;
  data: unknown;
  timestamp: number;
}

export interface EventFilter {
  type?: string;
  sale?: number;
  limit?: number;
  offset?: number;
}

export function insertEvent(
  db: Db,
  eventType: string,
  saleIndex: number | null,
  data: object,
  timestamp: number
): number {
  const result = db
    .prepare(`INSERT INTO events (event_type, sale_index, data, timestamp) VALUES (?, ?, ?, ?)`)
    .run(eventType, saleIndex, JSON.stringify(data, bigintReplacer), timestamp);
  return Number(result.lastInsertRowid);
}

export function getEvents(db: Db, filter: EventFilter = {}): RecordedEvent[] {
  const clauses: string[] = [];
  const params: (string | number)[] = [];
  if (filter.type) {
    clauses.push("event_type = ?");
    params.push(filter.type);
  }
  if (filter.sale !== undefined) {
    clauses.push("sale_index = ?");
    params.push(filter.sale);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";

  const rows = db
    .prepare<(string | number)[], EventRow>(
      `SELECT id, event_type, sale_index, data, timestamp FROM events ${where} ORDER BY id DESC LIMIT ? OFFSET ?`
    )
    .all(...params, filter.limit ?? 50, filter.offset ?? 0);

  return rows.map((row) => ({
    id: row.id,
    type: row.event_type,
    sale: row.sale_index,
    data: JSON.parse(row.data),
    timestamp: row.timestamp,
  }));
}

// ── Purchases ─────────────────────────────────────────────────────────

export interface PurchaseRecord {
  saleIndex: number;
  buyer: string;
  amountBought: bigint;
  priceInUsd: bigint;
  usdCost: bigint;
  nativeSent: bigint;
  referralCode: string;
  timestamp: number;
}

interface PurchaseRow {
  id: number;
  sale_index: number;
  buyer: string;
  amount_bought: string;
  price_in_usd: string;
  usd_cost: string;
  native_sent: string;
  referral_code: string;
  timestamp: number;
}

export interface PurchaseFilter {
  sale?: number;
  buyer?: string;
  referral?: string;
  limit?: number;
  offset?: number;
}

export function insertPurchase(db: Db, purchase: PurchaseRecord): number {
  const result = db
    .prepare(
      `INSERT INTO purchases (sale_index, buyer, amount_bought, price_in_usd, usd_cost, native_sent, referral_code, timestamp)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      purchase.saleIndex,
      purchase.buyer,
      purchase.amountBought.toString(),
      purchase.priceInUsd.toString(),
      purchase.usdCost.toString(),
      purchase.nativeSent.toString(),
      purchase.referralCode,
      purchase.timestamp
    );
  return Number(result.lastInsertRowid);
}

/** Amounts come back as decimal strings, the way the API hands them out. */
export function getPurchases(db: Db, filter: PurchaseFilter = {}) {
  const clauses: string[] = [];
  const params: (string | number)[] = [];
  if (filter.sale !== undefined) {
    clauses.push("sale_index = ?");
    params.push(filter.sale);
  }
  if (filter.buyer) {
    clauses.push("buyer = ?");
    params.push(filter.buyer);
  }
  if (filter.referral !== undefined) {
    clauses.push("referral_code = ?");
    params.push(filter.referral);
  }
  const where = clauses.length > 0 ? `WHERE ${clauses.join(" AND ")}` : "";

  const rows = db
    .prepare<(string | number)[], PurchaseRow>(`SELECT * FROM purchases ${where} ORDER BY id DESC LIMIT ? OFFSET ?`)
    .all(...params, filter.limit ?? 50, filter.offset ?? 0);

  return rows.map((row) => ({
    id: row.id,
    sale: row.sale_index,
    buyer: row.buyer,
    amountBought: row.amount_bought,
    priceInUsd: row.price_in_usd,
    usdCost: row.usd_cost,
    nativeSent: row.native_sent,
    referralCode: row.referral_code,
    timestamp: row.timestamp,
  }));
}

// ── Webhooks ──────────────────────────────────────────────────────────

export interface WebhookRow {
  id: number;
  url: string;
  events: string;
  active: number;
  secret: string | null;
}

export function getActiveWebhooks(db: Db): WebhookRow[] {
  return db
    .prepare<[], WebhookRow>(`SELECT id, url, events, active, secret FROM webhooks WHERE active = 1`)
    .all();
}

export function listWebhooks(db: Db): WebhookRow[] {
  return db.prepare<[], WebhookRow>(`SELECT id, url, events, active, secret FROM webhooks ORDER BY id`).all();
}

export function insertWebhook(db: Db, url: string, events: string[], secret?: string): number {
  const result = db
    .prepare(`INSERT INTO webhooks (url, events, secret) VALUES (?, ?, ?)`)
    .run(url, events.join(","), secret ?? null);
  return Number(result.lastInsertRowid);
}

export function deleteWebhook(db: Db, id: number): boolean {
  return db.prepare(`DELETE FROM webhooks WHERE id = ?`).run(id).changes > 0;
}
