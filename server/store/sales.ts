import crypto from "node:crypto";
import { formatLocalTimestamp, roundMoney } from "@shared/interest";
import type { CashMovement, SaleItem, SalesSnapshot } from "@shared/pawn";
import type { RowDataPacket } from "mysql2/promise";
import {
  forUpdate,
  getInitializedPool,
  withTransaction,
  type Queryable,
} from "../lib/mysql";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../utils/http-error";
import { insertCashMovement } from "./cash";
import { asNumber, mapSaleRow, type SaleRow } from "./rows";

interface SoldTotalsRow extends RowDataPacket {
  sold_count: number | string | null;
  sold_total: number | string | null;
}

const SALE_COLUMNS = `id, item_desc, price, status, sold_at`;
const SNAPSHOT_LIMIT = 500;

async function findSale(db: Queryable, saleId: string, lock = false): Promise<SaleItem> {
  const rows = await db.select<SaleRow>(
    `SELECT ${SALE_COLUMNS} FROM sales WHERE id = ? LIMIT 1${lock ? forUpdate(db) : ""}`,
    [saleId],
  );
  const row = rows[0];
  if (!row) throw new NotFoundError("Sale item not found");
  return mapSaleRow(row);
}

export async function getSalesSnapshot(): Promise<SalesSnapshot> {
  const db = await getInitializedPool();
  const rows = await db.select<SaleRow>(
    `SELECT ${SALE_COLUMNS} FROM sales ORDER BY created_at DESC, id ASC LIMIT ${SNAPSHOT_LIMIT}`,
  );
  const totals = await db.select<SoldTotalsRow>(
    `SELECT COUNT(*) AS sold_count, SUM(price) AS sold_total FROM sales WHERE status = 'SOLD'`,
  );
  return {
    items: rows.map(mapSaleRow),
    soldCount: asNumber(totals[0]?.sold_count),
    soldTotal: roundMoney(asNumber(totals[0]?.sold_total)),
  };
}

export async function createSale(
  itemDesc: string,
  price: number,
  now = new Date(),
): Promise<SaleItem> {
  const desc = itemDesc.trim();
  if (!desc) throw new ValidationError("Description is required");
  if (!Number.isFinite(price) || price <= 0) {
    throw new ValidationError("Price must be greater than zero");
  }
  const db = await getInitializedPool();
  const id = crypto.randomUUID();
  await db.execute(
    `INSERT INTO sales (id, item_desc, price, status, created_at) VALUES (?, ?, ?, 'FOR_SALE', ?)`,
    [id, desc, roundMoney(price), formatLocalTimestamp(now)],
  );
  return findSale(db, id);
}

export interface SaleResult {
  item: SaleItem;
  movement: CashMovement;
}

export async function markSaleSold(saleId: string, now = new Date()): Promise<SaleResult> {
  return withTransaction(async (conn) => {
    const item = await findSale(conn, saleId, true);
    if (item.status !== "FOR_SALE") {
      throw new ConflictError("Item is already sold", "INVALID_STATUS");
    }
    const soldAt = formatLocalTimestamp(now);
    const header = await conn.execute(
      `UPDATE sales SET status = 'SOLD', sold_at = ? WHERE id = ? AND status = 'FOR_SALE'`,
      [soldAt, saleId],
    );
    if (header.affectedRows !== 1) {
      throw new ConflictError("Item is already sold", "INVALID_STATUS");
    }
    const movement = await insertCashMovement(conn, {
      whenAt: soldAt,
      concept: `Sale: ${item.itemDesc}`,
      amount: item.price,
      ref: "SALE",
    });
    return { item: await findSale(conn, saleId), movement };
  });
}

export async function deleteSale(saleId: string): Promise<void> {
  const db = await getInitializedPool();
  const header = await db.execute(`DELETE FROM sales WHERE id = ?`, [saleId]);
  if (header.affectedRows === 0) throw new NotFoundError("Sale item not found");
}
