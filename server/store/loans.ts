import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import {
  addDays,
  buildTicketMessage,
  formatLocalDate,
  formatLocalTimestamp,
  loanQuote,
  monthlyBreakdown,
  normalizePhone,
  roundMoney,
} from "@shared/interest";
import type {
  Loan,
  LoanCreateInput,
  LoanCreateResult,
  LoanDocumentsInput,
  LoanFilter,
  LoanQuote,
  LoanUpdateInput,
  MonthlyBreakdown,
} from "@shared/pawn";
import { getConfig } from "../lib/config";
import {
  forUpdate,
  getInitializedPool,
  withTransaction,
  type Queryable,
} from "../lib/mysql";
import { saveDataUrl } from "../lib/uploads";
import { toCsv } from "../utils/csv";
import { ConflictError, NotFoundError } from "../utils/http-error";
import { insertCashMovement } from "./cash";
import {
  LOAN_COLUMNS,
  asNumber,
  formatTimestamp,
  mapLoanRow,
  type LoanRow,
  type SumRow,
} from "./rows";
import { getSettings } from "./settings";

interface LastPaidRow extends RowDataPacket {
  last_paid: string | Date | null;
}

export async function findLoan(
  db: Queryable,
  loanId: string,
  lock = false,
): Promise<Loan> {
  const rows = await db.select<LoanRow>(
    `SELECT ${LOAN_COLUMNS} FROM loans WHERE id = ? LIMIT 1${lock ? forUpdate(db) : ""}`,
    [loanId],
  );
  const row = rows[0];
  if (!row) throw new NotFoundError("Loan not found");
  return mapLoanRow(row);
}

export async function lastInterestPaidAt(
  db: Queryable,
  loanId: string,
): Promise<string | null> {
  const [row] = await db.select<LastPaidRow>(
    `SELECT MAX(paid_at) AS last_paid FROM payments WHERE loan_id = ? AND type = 'INTEREST'`,
    [loanId],
  );
  return formatTimestamp(row?.last_paid);
}

export async function principalPaid(db: Queryable, loanId: string): Promise<number> {
  const [row] = await db.select<SumRow>(
    `SELECT SUM(amount) AS total FROM payments WHERE loan_id = ? AND type = 'PRINCIPAL'`,
    [loanId],
  );
  return roundMoney(asNumber(row?.total));
}

export async function listLoans(filter: LoanFilter = {}): Promise<Loan[]> {
  const db = await getInitializedPool();
  const clauses: string[] = [];
  const params: unknown[] = [];
  const needle = filter.q?.trim();
  if (needle) {
    clauses.push(
      `(customer_name LIKE ? OR customer_id LIKE ? OR item_name LIKE ? OR phone LIKE ? OR id = ?)`,
    );
    const like = `%${needle}%`;
    params.push(like, like, like, like, needle);
  }
  if (filter.status) {
    clauses.push(`status = ?`);
    params.push(filter.status);
  }
  const where = clauses.length ? `WHERE ${clauses.join(" AND ")}` : "";
  const rows = await db.select<LoanRow>(
    `SELECT ${LOAN_COLUMNS} FROM loans ${where} ORDER BY created_at DESC, id ASC`,
    params,
  );
  return rows.map(mapLoanRow);
}

export async function getLoan(loanId: string): Promise<Loan> {
  return findLoan(await getInitializedPool(), loanId);
}

/**
 * Opens a loan dated `startDate` (time of day taken from `now`) and records
 * the cash handed to the customer as a negative movement.
 */
export async function createLoan(
  input: LoanCreateInput,
  now = new Date(),
): Promise<LoanCreateResult> {
  const settings = await getSettings();
  const createdAt = `${input.startDate} ${formatLocalTimestamp(now).slice(11)}`;
  const id = crypto.randomUUID();
  const amount = roundMoney(input.amount);
  const interestRate = input.interestRate ?? settings.defaultInterestRate;
  const dueDate = addDays(input.startDate, settings.defaultTermDays);

  return withTransaction(async (conn) => {
    await conn.execute(
      `INSERT INTO loans (id, created_at, item_name, weight_grams, customer_name, customer_id,
         phone, amount, interest_rate, due_date, status, photo_path)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 'ACTIVE', ?)`,
      [
        id,
        createdAt,
        input.itemName,
        input.weightGrams ?? 0,
        input.customerName,
        input.customerId,
        input.phone,
        amount,
        interestRate,
        dueDate,
        input.photoPath ?? "",
      ],
    );
    const movement = await insertCashMovement(conn, {
      whenAt: createdAt,
      concept: `Loan #${id} to ${input.customerName}`,
      amount: -amount,
      ref: "LOAN",
      loanId: id,
    });
    return { loan: await findLoan(conn, id), movement };
  });
}

const UPDATABLE_COLUMNS: ReadonlyArray<[keyof LoanUpdateInput, string]> = [
  ["itemName", "item_name"],
  ["weightGrams", "weight_grams"],
  ["customerName", "customer_name"],
  ["customerId", "customer_id"],
  ["phone", "phone"],
  ["interestRate", "interest_rate"],
  ["dueDate", "due_date"],
];

/** Descriptive fields only; principal moves through payments. */
export async function updateLoan(
  loanId: string,
  input: LoanUpdateInput,
): Promise<Loan> {
  return withTransaction(async (conn) => {
    await findLoan(conn, loanId, true);
    const sets: string[] = [];
    const params: unknown[] = [];
    for (const [field, column] of UPDATABLE_COLUMNS) {
      const value = input[field];
      if (value === undefined) continue;
      sets.push(`${column} = ?`);
      params.push(value);
    }
    if (sets.length) {
      await conn.execute(`UPDATE loans SET ${sets.join(", ")} WHERE id = ?`, [
        ...params,
        loanId,
      ]);
    }
    return findLoan(conn, loanId);
  });
}

/** Removes the loan together with its payments and reversal log. */
export async function deleteLoan(loanId: string): Promise<void> {
  await withTransaction(async (conn) => {
    await findLoan(conn, loanId, true);
    await conn.execute(`DELETE FROM payment_reversals WHERE loan_id = ?`, [loanId]);
    await conn.execute(`DELETE FROM payments WHERE loan_id = ?`, [loanId]);
    await conn.execute(`DELETE FROM inventory_items WHERE loan_id = ?`, [loanId]);
    await conn.execute(`DELETE FROM loans WHERE id = ?`, [loanId]);
  });
}

export async function redeemLoan(loanId: string, now = new Date()): Promise<Loan> {
  return withTransaction(async (conn) => {
    const loan = await findLoan(conn, loanId, true);
    if (loan.status !== "ACTIVE") {
      throw new ConflictError(
        `Loan is ${loan.status} and cannot be redeemed`,
        "INVALID_STATUS",
      );
    }
    await conn.execute(
      `UPDATE loans SET status = 'REDEEMED', redeemed_at = ? WHERE id = ?`,
      [formatLocalTimestamp(now), loanId],
    );
    return findLoan(conn, loanId);
  });
}

const DOCUMENT_COLUMNS: ReadonlyArray<[keyof LoanDocumentsInput, string, string]> = [
  ["photo", "photo_path", "items"],
  ["idFront", "id_front_path", "legal"],
  ["idBack", "id_back_path", "legal"],
  ["signature", "signature_path", "legal"],
];

/** Stores the item photo, both sides of the ID and the signature, each sent as a data URL. */
export async function updateLoanDocuments(
  loanId: string,
  input: LoanDocumentsInput,
): Promise<Loan> {
  const db = await getInitializedPool();
  await findLoan(db, loanId);

  const sets: string[] = [];
  const params: unknown[] = [];
  for (const [field, column, folder] of DOCUMENT_COLUMNS) {
    const dataUrl = input[field];
    if (!dataUrl) continue;
    sets.push(`${column} = ?`);
    params.push(await saveDataUrl(dataUrl, folder, `${loanId}-${field}`));
  }
  if (sets.length) {
    await db.execute(`UPDATE loans SET ${sets.join(", ")} WHERE id = ?`, [
      ...params,
      loanId,
    ]);
  }
  return findLoan(db, loanId);
}

export interface LoanInterestView {
  loan: Loan;
  quote: LoanQuote;
}

export async function getLoanQuote(
  loanId: string,
  asOf?: string,
  startOverride?: string | null,
  now = new Date(),
): Promise<LoanInterestView> {
  const db = await getInitializedPool();
  const loan = await findLoan(db, loanId);
  const quote = loanQuote({
    loan,
    lastInterestPaidAt: await lastInterestPaidAt(db, loanId),
    principalPaid: await principalPaid(db, loanId),
    asOf: asOf ?? formatLocalDate(now),
    startOverride,
  });
  return { loan, quote };
}

export async function getLoanBreakdown(
  loanId: string,
  fromMonth: string,
  toMonth: string,
): Promise<MonthlyBreakdown> {
  const loan = await getLoan(loanId);
  return monthlyBreakdown(loan.amount, loan.interestRate, fromMonth, toMonth);
}

export interface LoanTicket {
  phone: string;
  message: string;
}

export async function getLoanTicket(loanId: string, now = new Date()): Promise<LoanTicket> {
  const { loan, quote } = await getLoanQuote(loanId, undefined, null, now);
  return {
    phone: normalizePhone(loan.phone),
    message: buildTicketMessage(getConfig().APP_BRAND, loan, quote),
  };
}

export const LOAN_EXPORT_HEADER = [
  "id",
  "created_at",
  "item_name",
  "weight_grams",
  "customer_name",
  "customer_id",
  "phone",
  "amount",
  "interest_rate",
  "due_date",
  "photo_path",
  "status",
  "redeemed_at",
] as const;

export async function exportLoansCsv(): Promise<string> {
  const db = await getInitializedPool();
  const rows = await db.select<LoanRow>(
    `SELECT ${LOAN_COLUMNS} FROM loans ORDER BY created_at ASC, id ASC`,
  );
  return toCsv(
    LOAN_EXPORT_HEADER,
    rows.map(mapLoanRow).map((loan) => [
      loan.id,
      loan.createdAt,
      loan.itemName,
      loan.weightGrams.toFixed(2),
      loan.customerName,
      loan.customerId,
      loan.phone,
      loan.amount.toFixed(2),
      loan.interestRate.toFixed(2),
      loan.dueDate,
      loan.photoPath,
      loan.status,
      loan.redeemedAt ?? "",
    ]),
  );
}
