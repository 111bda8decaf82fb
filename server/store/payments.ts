import crypto from "node:crypto";
import type { RowDataPacket } from "mysql2/promise";
import {
  accrualStart,
  allocatePayment,
  formatLocalTimestamp,
  interestDue,
  originalPrincipal,
  renewedDueDate,
  roundMoney,
  settlesInterest,
  toDateOnly,
} from "@shared/interest";
import type {
  Payment,
  PaymentInput,
  PaymentResult,
  PaymentReversal,
  PaymentType,
  Receipt,
  ReceiptDetail,
  UndoInput,
  UndoResult,
} from "@shared/pawn";
import {
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
import { findLoan, lastInterestPaidAt, principalPaid } from "./loans";
import {
  PAYMENT_COLUMNS,
  formatDate,
  mapPaymentReversalRow,
  mapPaymentRow,
  type PaymentReversalRow,
  type PaymentRow,
} from "./rows";
import { getSettings } from "./settings";

interface PriorDueRow extends RowDataPacket {
  prior_due_date: string | Date | null;
}

interface CountRow extends RowDataPacket {
  total: number | string;
}

async function insertPayment(
  db: Queryable,
  loanId: string,
  paidAt: string,
  amount: number,
  type: PaymentType,
  notes: string,
): Promise<Payment> {
  const payment: Payment = {
    id: crypto.randomUUID(),
    loanId,
    paidAt,
    amount: roundMoney(amount),
    type,
    notes,
  };
  await db.execute(
    `INSERT INTO payments (id, loan_id, paid_at, amount, type, notes) VALUES (?, ?, ?, ?, ?, ?)`,
    [payment.id, payment.loanId, payment.paidAt, payment.amount, payment.type, payment.notes],
  );
  return payment;
}

/**
 * Takes one payment on an active loan. The amount is split between interest
 * and principal according to `mode`, both parts share one `paidAt`, and a
 * single PAY cash movement records the total. A payment that covers the
 * accrued interest and no principal pushes the due date forward.
 */
export async function recordPayment(
  input: PaymentInput,
  now = new Date(),
): Promise<PaymentResult> {
  if (!Number.isFinite(input.amount) || input.amount < 0) {
    throw new ValidationError("Amount must be zero or more");
  }
  if (!Number.isFinite(input.capitalExtra) || input.capitalExtra < 0) {
    throw new ValidationError("Extra principal must be zero or more");
  }
  if (roundMoney(input.amount + input.capitalExtra) <= 0) {
    throw new ValidationError("Payment total must be greater than zero");
  }

  const settings = await getSettings();
  const paidAt = formatLocalTimestamp(now);

  return withTransaction(async (conn) => {
    const loan = await findLoan(conn, input.loanId, true);
    if (loan.status !== "ACTIVE") {
      throw new ConflictError(
        `Loan is ${loan.status}; only active loans take payments`,
        "LOAN_NOT_ACTIVE",
      );
    }

    const start = accrualStart(
      loan.createdAt,
      await lastInterestPaidAt(conn, loan.id),
      input.fromDate,
    );
    const due = interestDue({
      principal: loan.amount,
      monthlyRate: loan.interestRate,
      start,
      asOf: input.asOfDate,
    });
    const allocation = allocatePayment({
      amount: input.amount,
      capitalExtra: input.capitalExtra,
      mode: input.mode,
      interestDue: due,
    });
    if (allocation.toPrincipal > loan.amount) {
      throw new ConflictError(
        `Principal payment ${allocation.toPrincipal.toFixed(2)} exceeds the outstanding balance ${loan.amount.toFixed(2)}`,
        "PRINCIPAL_EXCEEDS_BALANCE",
      );
    }

    const payments: Payment[] = [];
    if (allocation.toInterest > 0) {
      payments.push(
        await insertPayment(conn, loan.id, paidAt, allocation.toInterest, "INTEREST", input.notes),
      );
    }
    if (allocation.toPrincipal > 0) {
      payments.push(
        await insertPayment(conn, loan.id, paidAt, allocation.toPrincipal, "PRINCIPAL", input.notes),
      );
      const header = await conn.execute(
        `UPDATE loans SET amount = ROUND(amount - ?, 2) WHERE id = ? AND amount >= ?`,
        [allocation.toPrincipal, loan.id, allocation.toPrincipal],
      );
      if (header.affectedRows !== 1) {
        throw new ConflictError(
          "Principal payment exceeds the outstanding balance",
          "PRINCIPAL_EXCEEDS_BALANCE",
        );
      }
    }

    const total = roundMoney(allocation.toInterest + allocation.toPrincipal);
    const movement = await insertCashMovement(conn, {
      whenAt: paidAt,
      concept: `Payment on loan #${loan.id} (${loan.customerName})`,
      amount: total,
      ref: "PAY",
      loanId: loan.id,
    });

    let renewed: string | null = null;
    if (settings.renewDays > 0 && settlesInterest(allocation, due)) {
      renewed = renewedDueDate(toDateOnly(paidAt), loan.dueDate, settings.renewDays);
      await conn.execute(`UPDATE loans SET due_date = ? WHERE id = ?`, [renewed, loan.id]);
      await conn.execute(
        `UPDATE payments SET prior_due_date = ? WHERE loan_id = ? AND paid_at = ?`,
        [loan.dueDate, loan.id, paidAt],
      );
    }

    return {
      loan: await findLoan(conn, loan.id),
      payments,
      movement,
      interestDue: roundMoney(due),
      toInterest: allocation.toInterest,
      toPrincipal: allocation.toPrincipal,
      renewedDueDate: renewed,
    };
  });
}

function groupReceipts(payments: Payment[]): Receipt[] {
  const receipts = new Map<string, Receipt>();
  for (const payment of payments) {
    let receipt = receipts.get(payment.paidAt);
    if (!receipt) {
      receipt = {
        receiptId: payment.id,
        loanId: payment.loanId,
        paidAt: payment.paidAt,
        interestAmount: 0,
        principalAmount: 0,
        total: 0,
        notes: [],
      };
      receipts.set(payment.paidAt, receipt);
    }
    if (payment.type === "INTEREST") {
      receipt.interestAmount = roundMoney(receipt.interestAmount + payment.amount);
    } else {
      receipt.principalAmount = roundMoney(receipt.principalAmount + payment.amount);
    }
    receipt.total = roundMoney(receipt.interestAmount + receipt.principalAmount);
    if (payment.notes && !receipt.notes.includes(payment.notes)) {
      receipt.notes.push(payment.notes);
    }
  }
  return Array.from(receipts.values());
}

async function loanPayments(db: Queryable, loanId: string): Promise<Payment[]> {
  const rows = await db.select<PaymentRow>(
    `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE loan_id = ? ORDER BY paid_at ASC, type ASC, id ASC`,
    [loanId],
  );
  return rows.map(mapPaymentRow);
}

export async function listPayments(loanId: string): Promise<Payment[]> {
  const db = await getInitializedPool();
  await findLoan(db, loanId);
  return loanPayments(db, loanId);
}

export async function listReceipts(loanId: string): Promise<Receipt[]> {
  return groupReceipts(await listPayments(loanId));
}

/**
 * Due date the loan had before this receipt renewed it. Null when the receipt
 * did not renew or a later receipt renewed the loan again.
 */
async function renewalToRevert(
  conn: Queryable,
  loanId: string,
  paidAt: string,
): Promise<string | null> {
  const rows = await conn.select<PriorDueRow>(
    `SELECT prior_due_date FROM payments
     WHERE loan_id = ? AND paid_at = ? AND prior_due_date IS NOT NULL
     LIMIT 1`,
    [loanId, paidAt],
  );
  const prior = formatDate(rows[0]?.prior_due_date);
  if (!prior) return null;
  const later = await conn.select<CountRow>(
    `SELECT COUNT(*) AS total FROM payments
     WHERE loan_id = ? AND paid_at > ? AND prior_due_date IS NOT NULL`,
    [loanId, paidAt],
  );
  return Number(later[0]?.total ?? 0) > 0 ? null : prior;
}

/**
 * Reverses every payment row of one receipt: principal goes back onto the
 * loan, a renewal it made is rolled back, the rows are deleted, a negative
 * UNDO movement offsets the cash and the reversal is logged with its reason.
 */
export async function undoReceipt(
  input: UndoInput,
  now = new Date(),
): Promise<UndoResult> {
  const reason = input.reason.trim();
  if (!reason) throw new ValidationError("A reason is required to undo a payment");
  if (!input.paidAt && !input.receiptId) {
    throw new ValidationError("paidAt or receiptId is required");
  }

  return withTransaction(async (conn) => {
    const loan = await findLoan(conn, input.loanId, true);

    let paidAt = input.paidAt ?? "";
    if (input.receiptId) {
      const rows = await conn.select<PaymentRow>(
        `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE id = ? AND loan_id = ? LIMIT 1`,
        [input.receiptId, loan.id],
      );
      const row = rows[0];
      if (!row) throw new NotFoundError("Receipt not found");
      paidAt = mapPaymentRow(row).paidAt;
    }

    const rows = await conn.select<PaymentRow>(
      `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE loan_id = ? AND paid_at = ?`,
      [loan.id, paidAt],
    );
    const [receipt] = groupReceipts(rows.map(mapPaymentRow));
    if (!receipt) throw new NotFoundError("Receipt not found");

    const priorDueDate = await renewalToRevert(conn, loan.id, paidAt);
    if (priorDueDate) {
      await conn.execute(`UPDATE loans SET due_date = ? WHERE id = ?`, [
        priorDueDate,
        loan.id,
      ]);
    }
    if (receipt.principalAmount > 0) {
      await conn.execute(`UPDATE loans SET amount = ROUND(amount + ?, 2) WHERE id = ?`, [
        receipt.principalAmount,
        loan.id,
      ]);
    }
    await conn.execute(`DELETE FROM payments WHERE loan_id = ? AND paid_at = ?`, [
      loan.id,
      paidAt,
    ]);

    const reversedAt = formatLocalTimestamp(now);
    const movement = await insertCashMovement(conn, {
      whenAt: reversedAt,
      concept: `Reversal of payment on loan #${loan.id} from ${paidAt}`,
      amount: -receipt.total,
      ref: "UNDO",
      loanId: loan.id,
    });

    const reversal: PaymentReversal = {
      id: crypto.randomUUID(),
      loanId: loan.id,
      paidAt,
      interestAmount: receipt.interestAmount,
      principalAmount: receipt.principalAmount,
      total: receipt.total,
      reason,
      reversedBy: input.reversedBy,
      reversedAt,
    };
    await conn.execute(
      `INSERT INTO payment_reversals
         (id, loan_id, paid_at, interest_amount, principal_amount, total, reason, reversed_by, reversed_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        reversal.id,
        reversal.loanId,
        reversal.paidAt,
        reversal.interestAmount,
        reversal.principalAmount,
        reversal.total,
        reversal.reason,
        reversal.reversedBy,
        reversal.reversedAt,
      ],
    );

    return { loan: await findLoan(conn, loan.id), movement, reversal };
  });
}

/** Printable receipt for the payment `paymentId` belongs to. */
export async function getReceiptDetail(paymentId: string): Promise<ReceiptDetail> {
  const db = await getInitializedPool();
  const rows = await db.select<PaymentRow>(
    `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE id = ? LIMIT 1`,
    [paymentId],
  );
  const row = rows[0];
  if (!row) throw new NotFoundError("Receipt not found");
  const payment = mapPaymentRow(row);

  const loan = await findLoan(db, payment.loanId);
  const siblings = await db.select<PaymentRow>(
    `SELECT ${PAYMENT_COLUMNS} FROM payments WHERE loan_id = ? AND paid_at = ? ORDER BY type ASC, id ASC`,
    [loan.id, payment.paidAt],
  );
  const [receipt] = groupReceipts(siblings.map(mapPaymentRow));
  if (!receipt) throw new NotFoundError("Receipt not found");

  const paidToDate = await principalPaid(db, loan.id);
  const original = originalPrincipal(loan.amount, paidToDate);
  return {
    receipt,
    loan,
    originalPrincipal: original,
    principalPaidToDate: paidToDate,
    balance: Math.max(0, roundMoney(original - paidToDate)),
  };
}

export async function listReversals(loanId: string): Promise<PaymentReversal[]> {
  const db = await getInitializedPool();
  await findLoan(db, loanId);
  const rows = await db.select<PaymentReversalRow>(
    `SELECT id, loan_id, paid_at, interest_amount, principal_amount, total, reason, reversed_by, reversed_at
     FROM payment_reversals WHERE loan_id = ? ORDER BY reversed_at DESC, id ASC`,
    [loanId],
  );
  return rows.map(mapPaymentReversalRow);
}
