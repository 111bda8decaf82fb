import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import {
  addDays,
  formatLocalDate,
  roundMoney,
} from "@shared/interest";
import type {
  CashDailyReport,
  CashMovement,
  CashRef,
  DashboardSnapshot,
  Loan,
  Payment,
  Report,
  ReportKind,
} from "@shared/pawn";
import { getInitializedPool, type Queryable } from "../lib/mysql";
import {
  CASH_COLUMNS,
  LOAN_COLUMNS,
  PAYMENT_COLUMNS,
  asNumber,
  mapCashMovementRow,
  mapLoanRow,
  mapPaymentRow,
  type CashMovementRow,
  type LoanRow,
  type PaymentRow,
  type SumRow,
} from "./rows";

/** Loans due within this many days show up as upcoming / at risk. */
export const UPCOMING_WINDOW_DAYS = 7;

export interface CashMovementInput {
  whenAt: string;
  concept: string;
  amount: number;
  ref: CashRef;
  loanId?: string | null;
}

interface CountRow extends RowDataPacket {
  count: number | string;
}

interface DailyRow extends RowDataPacket {
  customer_name: string;
  interest: number | string | null;
  principal: number | string | null;
  total: number | string | null;
  loans_count: number | string;
  payments_count: number | string;
}

function dayBounds(date: string): [string, string] {
  return [`${date} 00:00:00`, `${date} 23:59:59`];
}

export async function insertCashMovement(
  db: Queryable,
  input: CashMovementInput,
): Promise<CashMovement> {
  const movement: CashMovement = {
    id: crypto.randomUUID(),
    whenAt: input.whenAt,
    concept: input.concept,
    amount: roundMoney(input.amount),
    ref: input.ref,
    loanId: input.loanId ?? null,
  };
  await db.execute(
    `INSERT INTO cash_movements (id, when_at, concept, amount, ref, loan_id)
     VALUES (?, ?, ?, ?, ?, ?)`,
    [
      movement.id,
      movement.whenAt,
      movement.concept,
      movement.amount,
      movement.ref,
      movement.loanId,
    ],
  );
  return movement;
}

export async function listCashMovements(date: string): Promise<CashMovement[]> {
  const db = await getInitializedPool();
  const rows = await db.select<CashMovementRow>(
    `SELECT ${CASH_COLUMNS} FROM cash_movements
     WHERE when_at BETWEEN ? AND ?
     ORDER BY when_at ASC, id ASC`,
    dayBounds(date),
  );
  return rows.map(mapCashMovementRow);
}

async function upcomingLoans(db: Queryable, today: string): Promise<Loan[]> {
  const rows = await db.select<LoanRow>(
    `SELECT ${LOAN_COLUMNS} FROM loans
     WHERE status = 'ACTIVE' AND due_date BETWEEN ? AND ?
     ORDER BY due_date ASC, created_at ASC`,
    [today, addDays(today, UPCOMING_WINDOW_DAYS)],
  );
  return rows.map(mapLoanRow);
}

export async function getDashboard(now = new Date()): Promise<DashboardSnapshot> {
  const db = await getInitializedPool();
  const today = formatLocalDate(now);

  const [active] = await db.select<CountRow>(
    `SELECT COUNT(*) AS count FROM loans WHERE status = 'ACTIVE'`,
  );
  const [custody] = await db.select<SumRow>(
    `SELECT SUM(amount) AS total FROM loans WHERE status = 'ACTIVE'`,
  );
  const [cash] = await db.select<SumRow>(
    `SELECT SUM(amount) AS total FROM cash_movements WHERE when_at BETWEEN ? AND ?`,
    dayBounds(today),
  );

  return {
    activeLoans: asNumber(active?.count),
    principalInCustody: roundMoney(asNumber(custody?.total)),
    cashToday: roundMoney(asNumber(cash?.total)),
    upcoming: await upcomingLoans(db, today),
  };
}

/**
 * Payments taken on one day, grouped by customer. `q` narrows to customers
 * whose name or ID contains it.
 */
export async function getCashDailyReport(
  date: string,
  q = "",
): Promise<CashDailyReport> {
  const db = await getInitializedPool();
  const params: unknown[] = dayBounds(date);
  let filter = "";
  const needle = q.trim();
  if (needle) {
    filter = ` AND (l.customer_name LIKE ? OR l.customer_id LIKE ?)`;
    params.push(`%${needle}%`, `%${needle}%`);
  }

  const customer = `COALESCE(NULLIF(TRIM(l.customer_name), ''), '(no name)')`;
  const rows = await db.select<DailyRow>(
    `SELECT ${customer} AS customer_name,
            SUM(CASE WHEN p.type = 'INTEREST' THEN p.amount ELSE 0 END) AS interest,
            SUM(CASE WHEN p.type = 'PRINCIPAL' THEN p.amount ELSE 0 END) AS principal,
            SUM(p.amount) AS total,
            COUNT(DISTINCT l.id) AS loans_count,
            COUNT(p.id) AS payments_count
     FROM payments p
     JOIN loans l ON l.id = p.loan_id
     WHERE p.paid_at BETWEEN ? AND ?${filter}
     GROUP BY ${customer}
     ORDER BY total DESC, customer_name ASC`,
    params,
  );

  const mapped = rows.map((row) => ({
    customerName: row.customer_name,
    interest: roundMoney(asNumber(row.interest)),
    principal: roundMoney(asNumber(row.principal)),
    total: roundMoney(asNumber(row.total)),
    loansCount: asNumber(row.loans_count),
    paymentsCount: asNumber(row.payments_count),
  }));

  const totalInterest = roundMoney(mapped.reduce((sum, row) => sum + row.interest, 0));
  const totalPrincipal = roundMoney(mapped.reduce((sum, row) => sum + row.principal, 0));
  return {
    date,
    rows: mapped,
    totalInterest,
    totalPrincipal,
    total: roundMoney(totalInterest + totalPrincipal),
  };
}

export async function getReport(
  kind: ReportKind,
  from: string,
  to: string,
  now = new Date(),
): Promise<Report> {
  const db = await getInitializedPool();
  if (kind === "risk") {
    return { kind, loans: await upcomingLoans(db, formatLocalDate(now)) };
  }

  const type = kind === "interest" ? "INTEREST" : "PRINCIPAL";
  const rows = await db.select<PaymentRow>(
    `SELECT ${PAYMENT_COLUMNS} FROM payments
     WHERE type = ? AND paid_at BETWEEN ? AND ?
     ORDER BY paid_at ASC, id ASC`,
    [type, `${from} 00:00:00`, `${to} 23:59:59`],
  );
  const payments: Payment[] = rows.map(mapPaymentRow);
  return {
    kind,
    from,
    to,
    payments,
    total: roundMoney(payments.reduce((sum, payment) => sum + payment.amount, 0)),
  };
}
