export type LoanStatus = "ACTIVE" | "REDEEMED" | "LOST" | "SOLD";

export type PaymentType = "INTEREST" | "PRINCIPAL";

export type PaymentMode = "AUTO" | "INTEREST_ONLY" | "PRINCIPAL_ONLY";

export type CashRef = "LOAN" | "PAY" | "UNDO" | "SALE" | "INVENTORY_SALE";

export type ItemStatus = "FOR_SALE" | "SOLD";

export interface Loan {
  id: string;
  createdAt: string;
  itemName: string;
  weightGrams: number;
  customerName: string;
  customerId: string;
  phone: string;
  amount: number;
  interestRate: number;
  dueDate: string;
  status: LoanStatus;
  photoPath: string;
  idFrontPath: string;
  idBackPath: string;
  signaturePath: string;
  redeemedAt: string | null;
}

export interface Payment {
  id: string;
  loanId: string;
  paidAt: string;
  amount: number;
  type: PaymentType;
  notes: string;
}

/** Payment rows of one loan sharing the same `paidAt`. */
export interface Receipt {
  receiptId: string;
  loanId: string;
  paidAt: string;
  interestAmount: number;
  principalAmount: number;
  total: number;
  notes: string[];
}

export interface CashMovement {
  id: string;
  whenAt: string;
  concept: string;
  amount: number;
  ref: CashRef;
  loanId: string | null;
}

export interface PaymentReversal {
  id: string;
  loanId: string;
  paidAt: string;
  interestAmount: number;
  principalAmount: number;
  total: number;
  reason: string;
  reversedBy: string;
  reversedAt: string;
}

export interface Client {
  id: string;
  name: string;
  document: string;
  phone: string;
  address: string;
  createdAt: string;
}

export interface SaleItem {
  id: string;
  itemDesc: string;
  price: number;
  status: ItemStatus;
  soldAt: string | null;
}

export interface InventoryItem {
  id: string;
  loanId: string | null;
  itemDesc: string;
  status: ItemStatus;
  createdAt: string;
}

export interface ShopSettings {
  defaultInterestRate: number;
  defaultTermDays: number;
  renewDays: number;
  recoveryEmail: string;
  smtpHost: string;
  smtpPort: number;
  smtpUser: string;
  smtpPass: string;
}

export interface LoanCreateInput {
  customerName: string;
  customerId: string;
  phone: string;
  itemName: string;
  weightGrams?: number;
  amount: number;
  /** Monthly percentage; the shop default applies when omitted. */
  interestRate?: number;
  startDate: string;
  photoPath?: string;
}

export interface LoanUpdateInput {
  itemName?: string;
  weightGrams?: number;
  customerName?: string;
  customerId?: string;
  phone?: string;
  interestRate?: number;
  dueDate?: string;
}

export interface LoanCreateResult {
  loan: Loan;
  movement: CashMovement;
}

export interface LoanFilter {
  q?: string;
  status?: LoanStatus;
}

export interface LoanDocumentsInput {
  photo?: string;
  idFront?: string;
  idBack?: string;
  signature?: string;
}

export interface PaymentInput {
  loanId: string;
  amount: number;
  capitalExtra: number;
  mode: PaymentMode;
  asOfDate: string;
  fromDate?: string | null;
  notes: string;
}

export interface PaymentResult {
  loan: Loan;
  payments: Payment[];
  movement: CashMovement;
  interestDue: number;
  toInterest: number;
  toPrincipal: number;
  renewedDueDate: string | null;
}

export interface UndoInput {
  loanId: string;
  paidAt?: string;
  receiptId?: string;
  reason: string;
  reversedBy: string;
}

export interface UndoResult {
  loan: Loan;
  movement: CashMovement;
  reversal: PaymentReversal;
}

export interface LoanQuote {
  asOf: string;
  accrualStart: string;
  interestDue: number;
  totalDue: number;
  interestAtDueDate: number;
  totalAtDueDate: number;
  nextInterestDueDate: string;
  monthsOverdue: number;
  originalPrincipal: number;
}

export interface MonthlyInterestRow {
  month: string;
  interest: number;
}

export interface MonthlyBreakdown {
  rows: MonthlyInterestRow[];
  total: number;
}

export interface ReceiptDetail {
  receipt: Receipt;
  loan: Loan;
  originalPrincipal: number;
  principalPaidToDate: number;
  balance: number;
}

export interface DashboardSnapshot {
  activeLoans: number;
  principalInCustody: number;
  cashToday: number;
  upcoming: Loan[];
}

export interface CashDailyRow {
  customerName: string;
  interest: number;
  principal: number;
  total: number;
  loansCount: number;
  paymentsCount: number;
}

export interface CashDailyReport {
  date: string;
  rows: CashDailyRow[];
  totalInterest: number;
  totalPrincipal: number;
  total: number;
}

export type ReportKind = "interest" | "principal" | "risk";

export interface PaymentReport {
  kind: "interest" | "principal";
  from: string;
  to: string;
  payments: Payment[];
  total: number;
}

export interface RiskReport {
  kind: "risk";
  loans: Loan[];
}

export type Report = PaymentReport | RiskReport;

export interface SalesSnapshot {
  items: SaleItem[];
  soldCount: number;
  soldTotal: number;
}

export interface ClientCreateInput {
  name: string;
  document: string;
  phone?: string;
  address?: string;
}
