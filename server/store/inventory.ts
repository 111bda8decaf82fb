import crypto from "node:crypto";
import { formatLocalTimestamp, roundMoney } from "@shared/interest";
import type { CashMovement, InventoryItem, Loan } from "@shared/pawn";
import { getInitializedPool, withTransaction } from "../lib/mysql";
import { ConflictError, ValidationError } from "../utils/http-error";
import { insertCashMovement } from "./cash";
import { findLoan } from "./loans";
import { mapInventoryItemRow, type InventoryItemRow } from "./rows";

export interface ForfeitResult {
  loan: Loan;
  item: InventoryItem;
}

export interface InventorySaleResult {
  loan: Loan;
  movement: CashMovement;
}

/** Forfeits an active loan: the pledged item moves to inventory for resale. */
export async function markLoanLost(
  loanId: string,
  now = new Date(),
): Promise<ForfeitResult> {
  return withTransaction(async (conn) => {
    const loan = await findLoan(conn, loanId, true);
    if (loan.status !== "ACTIVE") {
      throw new ConflictError(
        `Loan is ${loan.status} and cannot be marked lost`,
        "INVALID_STATUS",
      );
    }
    await conn.execute(`UPDATE loans SET status = 'LOST' WHERE id = ?`, [loanId]);

    const item: InventoryItem = {
      id: crypto.randomUUID(),
      loanId,
      itemDesc: `${loan.itemName} - ${loan.customerName} (loan #${loan.id})`,
      status: "FOR_SALE",
      createdAt: formatLocalTimestamp(now),
    };
    await conn.execute(
      `INSERT INTO inventory_items (id, loan_id, item_desc, status, created_at)
       VALUES (?, ?, ?, ?, ?)`,
      [item.id, item.loanId, item.itemDesc, item.status, item.createdAt],
    );
    return { loan: await findLoan(conn, loanId), item };
  });
}

export async function listInventory(): Promise<InventoryItem[]> {
  const db = await getInitializedPool();
  const rows = await db.select<InventoryItemRow>(
    `SELECT id, loan_id, item_desc, status, created_at FROM inventory_items
     ORDER BY created_at DESC, id ASC`,
  );
  return rows.map(mapInventoryItemRow);
}

/** Sells a forfeited item; the price comes into the till as an INVENTORY_SALE movement. */
export async function sellInventoryLoan(
  loanId: string,
  price: number,
  now = new Date(),
): Promise<InventorySaleResult> {
  if (!Number.isFinite(price) || price <= 0) {
    throw new ValidationError("Price must be greater than zero");
  }
  return withTransaction(async (conn) => {
    const loan = await findLoan(conn, loanId, true);
    if (loan.status !== "LOST") {
      throw new ConflictError(
        `Loan is ${loan.status}; only forfeited items can be sold`,
        "INVALID_STATUS",
      );
    }
    await conn.execute(`UPDATE loans SET status = 'SOLD' WHERE id = ?`, [loanId]);
    await conn.execute(
      `UPDATE inventory_items SET status = 'SOLD' WHERE loan_id = ?`,
      [loanId],
    );
    const movement = await insertCashMovement(conn, {
      whenAt: formatLocalTimestamp(now),
      concept: `Sale of forfeited item ${loan.itemName} (loan #${loan.id})`,
      amount: roundMoney(price),
      ref: "INVENTORY_SALE",
      loanId,
    });
    return { loan: await findLoan(conn, loanId), movement };
  });
}
