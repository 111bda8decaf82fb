import type { RowDataPacket } from "mysql2/promise";
import type {
  CashMovement,
  CashRef,
  Client,
  InventoryItem,
  ItemStatus,
  Loan,
  LoanStatus,
  Payment,
  PaymentReversal,
  PaymentType,
  SaleItem,
} from "@shared/pawn";

export interface LoanRow extends RowDataPacket {
  id: string;
  created_at: string | Date;
  item_name: string;
  weight_grams: number | string;
  customer_name: string | null;
  customer_id: string | null;
  phone: string;
  amount: number | string;
  interest_rate: number | string;
  due_date: string | Date;
  status: LoanStatus;
  photo_path: string | null;
  id_front_path: string | null;
  id_back_path: string | null;
  signature_path: string | null;
  redeemed_at: string | Date | null;
}

export interface PaymentRow extends RowDataPacket {
  id: string;
  loan_id: string;
  paid_at: string | Date;
  amount: number | string;
  type: PaymentType;
  notes: string | null;
}

export interface CashMovementRow extends RowDataPacket {
  id: string;
  when_at: string | Date;
  concept: string;
  amount: number | string;
  ref: CashRef;
  loan_id: string | null;
}

export interface PaymentReversalRow extends RowDataPacket {
  id: string;
  loan_id: string;
  paid_at: string | Date;
  interest_amount: number | string;
  principal_amount: number | string;
  total: number | string;
  reason: string;
  reversed_by: string;
  reversed_at: string | Date;
}

export interface ClientRow extends RowDataPacket {
  id: string;
  name: string;
  document: string;
  phone: string | null;
  address: string | null;
  created_at: string | Date;
}

export interface SaleRow extends RowDataPacket {
  id: string;
  item_desc: string;
  price: number | string;
  status: ItemStatus;
  sold_at: string | Date | null;
}

export interface InventoryItemRow extends RowDataPacket {
  id: string;
  loan_id: string | null;
  item_desc: string;
  status: ItemStatus;
  created_at: string | Date;
}

export interface SumRow extends RowDataPacket {
  total: number | string | null;
}

export const LOAN_COLUMNS = `id, created_at, item_name, weight_grams, customer_name, customer_id, phone,
  amount, interest_rate, due_date, status, photo_path, id_front_path, id_back_path,
  signature_path, redeemed_at`;

export const PAYMENT_COLUMNS = `id, loan_id, paid_at, amount, type, notes`;

export const CASH_COLUMNS = `id, when_at, concept, amount, ref, loan_id`;

export function asNumber(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === "number") return value;
  if (typeof value === "string") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

function pad(value: number) {
  return String(value).padStart(2, "0");
}

export function formatDate(value: string | Date | null | undefined): string {
  if (!value) return "";
  if (typeof value === "string") {
    if (value.length >= 10) return value.slice(0, 10);
    return value;
  }
  return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`;
}

/** `YYYY-MM-DD HH:MM:SS`; receipts are matched on this exact text. */
export function formatTimestamp(
  value: string | Date | null | undefined,
): string | null {
  if (!value) return null;
  if (typeof value === "string") return value.slice(0, 19).replace("T", " ");
  return `${formatDate(value)} ${pad(value.getHours())}:${pad(value.getMinutes())}:${pad(value.getSeconds())}`;
}

export function mapLoanRow(row: LoanRow): Loan {
  return {
    id: row.id,
    createdAt: formatTimestamp(row.created_at) ?? "",
    itemName: row.item_name,
    weightGrams: asNumber(row.weight_grams),
    customerName: (row.customer_name ?? "").trim(),
    customerId: row.customer_id ?? "",
    phone: row.phone,
    amount: asNumber(row.amount),
    interestRate: asNumber(row.interest_rate),
    dueDate: formatDate(row.due_date),
    status: row.status,
    photoPath: row.photo_path ?? "",
    idFrontPath: row.id_front_path ?? "",
    idBackPath: row.id_back_path ?? "",
    signaturePath: row.signature_path ?? "",
    redeemedAt: formatTimestamp(row.redeemed_at),
  };
}

export function mapPaymentRow(row: PaymentRow): Payment {
  return {
    id: row.id,
    loanId: row.loan_id,
    paidAt: formatTimestamp(row.paid_at) ?? "",
    amount: asNumber(row.amount),
    type: row.type,
    notes: row.notes ?? "",
  };
}

export function mapCashMovementRow(row: CashMovementRow): CashMovement {
  return {
    id: row.id,
    whenAt: formatTimestamp(row.when_at) ?? "",
    concept: row.concept,
    amount: asNumber(row.amount),
    ref: row.ref,
    loanId: row.loan_id ?? null,
  };
}

export function mapPaymentReversalRow(row: PaymentReversalRow): PaymentReversal {
  return {
    id: row.id,
    loanId: row.loan_id,
    paidAt: formatTimestamp(row.paid_at) ?? "",
    interestAmount: asNumber(row.interest_amount),
    principalAmount: asNumber(row.principal_amount),
    total: asNumber(row.total),
    reason: row.reason,
    reversedBy: row.reversed_by,
    reversedAt: formatTimestamp(row.reversed_at) ?? "",
  };
}

export function mapClientRow(row: ClientRow): Client {
  return {
    id: row.id,
    name: row.name,
    document: row.document,
    phone: row.phone ?? "",
    address: row.address ?? "",
    createdAt: formatTimestamp(row.created_at) ?? "",
  };
}

export function mapSaleRow(row: SaleRow): SaleItem {
  return {
    id: row.id,
    itemDesc: row.item_desc,
    price: asNumber(row.price),
    status: row.status,
    soldAt: formatTimestamp(row.sold_at),
  };
}

export function mapInventoryItemRow(row: InventoryItemRow): InventoryItem {
  return {
    id: row.id,
    loanId: row.loan_id ?? null,
    itemDesc: row.item_desc,
    status: row.status,
    createdAt: formatTimestamp(row.created_at) ?? "",
  };
}
