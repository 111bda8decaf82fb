/**
 * Interest accrual and payment allocation.
 *
 * Pure functions only: no database, no clock. Callers pass every date in as
 * a `YYYY-MM-DD` string (timestamps `YYYY-MM-DD HH:MM:SS` are accepted and
 * truncated to their date part).
 */
import type {
  Loan,
  LoanQuote,
  MonthlyBreakdown,
  PaymentMode,
} from "./pawn";

/** Every month counts as 30 days when turning a monthly rate into a daily one. */
export const DAYS_PER_MONTH = 30;

/** How far below the computed interest a payment may fall and still renew the loan. */
export const RENEWAL_TOLERANCE = 0.01;

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONTH_KEY = /^(\d{4})-(\d{2})$/;

function pad(value: number, width = 2) {
  return String(value).padStart(width, "0");
}

export function roundMoney(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function floorMoney(value: number): number {
  return Math.floor(value * 100 + 1e-6) / 100;
}

export function toDateOnly(value: string): string {
  return value.slice(0, 10);
}

export function isIsoDate(value: unknown): value is string {
  if (typeof value !== "string") return false;
  const match = ISO_DATE.exec(value);
  if (!match) return false;
  const [, y, m, d] = match.map(Number);
  const date = new Date(Date.UTC(y, m - 1, d));
  return (
    date.getUTCFullYear() === y &&
    date.getUTCMonth() === m - 1 &&
    date.getUTCDate() === d
  );
}

export function isMonthKey(value: unknown): value is string {
  if (typeof value !== "string") return false;
  const match = MONTH_KEY.exec(value);
  if (!match) return false;
  const month = Number(match[2]);
  return month >= 1 && month <= 12;
}

function toUtcMs(value: string): number {
  const [y, m, d] = toDateOnly(value).split("-").map(Number);
  return Date.UTC(y, m - 1, d);
}

/** Whole calendar days from `from` to `to`; negative when `to` is earlier. */
export function daysBetween(from: string, to: string): number {
  return Math.round((toUtcMs(to) - toUtcMs(from)) / MS_PER_DAY);
}

export function addDays(value: string, days: number): string {
  const date = new Date(toUtcMs(value) + days * MS_PER_DAY);
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

export function laterDate(a: string, b: string): string {
  return toDateOnly(a) >= toDateOnly(b) ? toDateOnly(a) : toDateOnly(b);
}

/** Local wall-clock date, `YYYY-MM-DD`. */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/** Local wall-clock timestamp, `YYYY-MM-DD HH:MM:SS`. Receipts are keyed on this exact string. */
export function formatLocalTimestamp(date: Date): string {
  return `${formatLocalDate(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Where unpaid interest starts counting: an explicit override wins, then the
 * most recent INTEREST payment, then the day the loan was created.
 */
export function accrualStart(
  createdAt: string,
  lastInterestPaidAt: string | null,
  override?: string | null,
): string {
  if (override) return toDateOnly(override);
  if (lastInterestPaidAt) return toDateOnly(lastInterestPaidAt);
  return toDateOnly(createdAt);
}

/** Days of interest owed; never less than one. */
export function accrualDays(start: string, asOf: string): number {
  return Math.max(1, daysBetween(start, asOf));
}

export interface InterestDueParams {
  principal: number;
  monthlyRate: number;
  start: string;
  asOf: string;
}

export function interestDue({
  principal,
  monthlyRate,
  start,
  asOf,
}: InterestDueParams): number {
  const days = accrualDays(start, asOf);
  const due = (principal * monthlyRate * days) / (100 * DAYS_PER_MONTH);
  return Math.max(0, due);
}

export interface AllocationParams {
  amount: number;
  capitalExtra?: number;
  mode: PaymentMode;
  interestDue: number;
}

export interface Allocation {
  toInterest: number;
  toPrincipal: number;
}

export function allocatePayment({
  amount,
  capitalExtra = 0,
  mode,
  interestDue: due,
}: AllocationParams): Allocation {
  if (mode === "INTEREST_ONLY") {
    return {
      toInterest: roundMoney(amount),
      toPrincipal: roundMoney(capitalExtra),
    };
  }
  if (mode === "PRINCIPAL_ONLY") {
    return { toInterest: 0, toPrincipal: roundMoney(amount + capitalExtra) };
  }
  // AUTO: interest first, floored to the cent so it never exceeds what is owed
  const toInterest = floorMoney(Math.min(amount, Math.max(0, due)));
  return {
    toInterest,
    toPrincipal: roundMoney(amount - toInterest + capitalExtra),
  };
}

/** A payment renews the loan when it settles the accrued interest and touches no principal. */
export function settlesInterest(allocation: Allocation, due: number): boolean {
  return (
    allocation.toPrincipal === 0 &&
    allocation.toInterest > 0 &&
    allocation.toInterest >= due - RENEWAL_TOLERANCE
  );
}

export function renewedDueDate(
  paymentDate: string,
  currentDueDate: string,
  renewDays: number,
): string {
  return addDays(laterDate(paymentDate, currentDueDate), renewDays);
}

export function monthlyInterest(principal: number, monthlyRate: number): number {
  return (principal * monthlyRate) / 100;
}

export function monthsRange(fromMonth: string, toMonth: string): string[] {
  const [y1, m1] = fromMonth.split("-").map(Number);
  const [y2, m2] = toMonth.split("-").map(Number);
  const months: string[] = [];
  let y = y1;
  let m = m1;
  while (y < y2 || (y === y2 && m <= m2)) {
    months.push(`${pad(y, 4)}-${pad(m)}`);
    m += 1;
    if (m > 12) {
      m = 1;
      y += 1;
    }
  }
  return months;
}

/**
 * Flat projection: the same monthly interest for every calendar month in
 * range, regardless of what has actually been paid.
 */
export function monthlyBreakdown(
  principal: number,
  monthlyRate: number,
  fromMonth: string,
  toMonth: string,
): MonthlyBreakdown {
  const perMonth = monthlyInterest(principal, monthlyRate);
  const rows = monthsRange(fromMonth, toMonth).map((month) => ({
    month,
    interest: perMonth,
  }));
  return { rows, total: perMonth * rows.length };
}

export function nextInterestDueDate(
  createdAt: string,
  lastInterestPaidAt: string | null,
): string {
  return addDays(lastInterestPaidAt ?? createdAt, DAYS_PER_MONTH);
}

/** Whole 30-day periods of unpaid interest. */
export function monthsOverdue(start: string, asOf: string): number {
  const days = daysBetween(start, asOf);
  if (days <= 0) return 0;
  return Math.floor(days / DAYS_PER_MONTH);
}

/** Principal handed over at creation: what is still owed plus every principal payment. */
export function originalPrincipal(current: number, principalPaid: number): number {
  return roundMoney(current + principalPaid);
}

export interface QuoteParams {
  loan: Pick<Loan, "amount" | "interestRate" | "createdAt" | "dueDate">;
  lastInterestPaidAt: string | null;
  principalPaid: number;
  asOf: string;
  startOverride?: string | null;
}

export function loanQuote({
  loan,
  lastInterestPaidAt,
  principalPaid,
  asOf,
  startOverride,
}: QuoteParams): LoanQuote {
  const start = accrualStart(loan.createdAt, lastInterestPaidAt, startOverride);
  const dueToday = interestDue({
    principal: loan.amount,
    monthlyRate: loan.interestRate,
    start,
    asOf,
  });
  const dueAtDueDate = interestDue({
    principal: loan.amount,
    monthlyRate: loan.interestRate,
    start,
    asOf: loan.dueDate,
  });
  return {
    asOf,
    accrualStart: start,
    interestDue: roundMoney(dueToday),
    totalDue: roundMoney(loan.amount + dueToday),
    interestAtDueDate: roundMoney(dueAtDueDate),
    totalAtDueDate: roundMoney(loan.amount + dueAtDueDate),
    nextInterestDueDate: nextInterestDueDate(loan.createdAt, lastInterestPaidAt),
    monthsOverdue: monthsOverdue(start, asOf),
    originalPrincipal: originalPrincipal(loan.amount, principalPaid),
  };
}

export function normalizePhone(raw: string): string {
  const value = (raw ?? "").trim();
  const digits = value.replace(/\D/g, "");
  return value.startsWith("+") ? `+${digits}` : digits;
}

function money(value: number) {
  return `$${value.toFixed(2)}`;
}

/** Plain-text ticket a clerk can paste into WhatsApp or SMS. */
export function buildTicketMessage(
  brand: string,
  loan: Loan,
  quote: LoanQuote,
): string {
  return [
    `${brand} - Ticket #${loan.id}`,
    `Date: ${toDateOnly(loan.createdAt)}`,
    `Customer: ${loan.customerName} (ID ${loan.customerId})`,
    `Item: ${loan.itemName} - ${loan.weightGrams.toFixed(2)} g`,
    `Principal: ${money(loan.amount)}`,
    `Monthly interest: ${loan.interestRate.toFixed(2)}%`,
    `Due date: ${loan.dueDate}`,
    `Next interest due: ${quote.nextInterestDueDate}`,
    `Interest to date: ${money(quote.interestDue)}`,
    `Total to date: ${money(quote.totalDue)}`,
    `Interest at due date: ${money(quote.interestAtDueDate)}`,
    `Total at due date: ${money(quote.totalAtDueDate)}`,
  ].join("\n");
}
