import { afterAll, beforeEach, describe, expect, it } from "vitest";
import type { Client, LoanCreateInput } from "@shared/pawn";
import { closeDatabase, withTransaction } from "../../lib/mysql";
import { createLoan, getLoan, getLoanQuote, listLoans, redeemLoan } from "../loans";
import {
  getReceiptDetail,
  listReceipts,
  listReversals,
  recordPayment,
  undoReceipt,
} from "../payments";
import { getCashDailyReport, getDashboard, getReport, listCashMovements } from "../cash";
import { listInventory, markLoanLost, sellInventoryLoan } from "../inventory";
import { getSettings, updateSettings } from "../settings";
import { resetLedger } from "../system";
import { createClient, listClients } from "../clients";
import { createSale, getSalesSnapshot, markSaleSold } from "../sales";

const opening: LoanCreateInput = {
  customerName: "Ana Perez",
  customerId: "30111222",
  phone: "1155551234",
  itemName: "Gold ring",
  weightGrams: 5,
  amount: 1000,
  interestRate: 20,
  startDate: "2024-01-01",
};

const JAN_1 = new Date(2024, 0, 1, 10, 0, 0);
const JAN_31 = new Date(2024, 0, 31, 11, 0, 0);

async function openLoan(input: Partial<LoanCreateInput> = {}) {
  const { loan } = await createLoan({ ...opening, ...input }, JAN_1);
  return loan;
}

describe("ledger store", () => {
  beforeEach(async () => {
    await resetLedger();
  });

  afterAll(async () => {
    await closeDatabase();
  });

  describe("createLoan", () => {
    it("dates the loan and pays out cash", async () => {
      const { loan, movement } = await createLoan(opening, JAN_1);
      expect(loan).toMatchObject({
        createdAt: "2024-01-01 10:00:00",
        dueDate: "2024-03-31",
        amount: 1000,
        interestRate: 20,
        status: "ACTIVE",
      });
      expect(movement).toMatchObject({ amount: -1000, ref: "LOAN", loanId: loan.id });
      expect(await listCashMovements("2024-01-01")).toEqual([movement]);
    });

    it("falls back to the default rate", async () => {
      const { loan } = await createLoan({ ...opening, interestRate: undefined }, JAN_1);
      expect(loan.interestRate).toBe((await getSettings()).defaultInterestRate);
    });

    it("filters by customer and status", async () => {
      const ana = await openLoan();
      const bruno = await openLoan({ customerName: "Bruno Diaz", customerId: "27999888" });
      await redeemLoan(bruno.id, JAN_31);

      expect((await listLoans({ q: "ana" })).map((loan) => loan.id)).toEqual([ana.id]);
      expect((await listLoans({ status: "REDEEMED" })).map((loan) => loan.id)).toEqual([bruno.id]);
    });
  });

  describe("recordPayment", () => {
    it("splits an AUTO payment between interest and principal", async () => {
      const loan = await openLoan();
      const result = await recordPayment(
        { loanId: loan.id, amount: 250, capitalExtra: 0, mode: "AUTO", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );

      expect(result.interestDue).toBe(200);
      expect(result.toInterest).toBe(200);
      expect(result.toPrincipal).toBe(50);
      expect(result.renewedDueDate).toBeNull();
      expect(result.loan.amount).toBe(950);
      expect(result.loan.dueDate).toBe("2024-03-31");
      expect(result.payments.map((p) => [p.type, p.amount, p.paidAt])).toEqual([
        ["INTEREST", 200, "2024-01-31 11:00:00"],
        ["PRINCIPAL", 50, "2024-01-31 11:00:00"],
      ]);
      expect(result.movement).toMatchObject({ amount: 250, ref: "PAY" });
    });

    it("renews the loan when only interest is paid in full", async () => {
      const loan = await openLoan();
      const result = await recordPayment(
        { loanId: loan.id, amount: 200, capitalExtra: 0, mode: "INTEREST_ONLY", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );
      expect(result.renewedDueDate).toBe("2024-04-30");
      expect(result.loan.dueDate).toBe("2024-04-30");
      expect(result.loan.amount).toBe(1000);
    });

    it("does not renew when renewal is switched off", async () => {
      await updateSettings({ renewDays: 0 });
      try {
        const loan = await openLoan();
        const result = await recordPayment(
          { loanId: loan.id, amount: 200, capitalExtra: 0, mode: "INTEREST_ONLY", asOfDate: "2024-01-31", notes: "" },
          JAN_31,
        );
        expect(result.renewedDueDate).toBeNull();
        expect(result.loan.dueDate).toBe("2024-03-31");
      } finally {
        await updateSettings({ renewDays: 30 });
      }
    });

    it("accrues from the last interest payment", async () => {
      const loan = await openLoan();
      await recordPayment(
        { loanId: loan.id, amount: 200, capitalExtra: 0, mode: "INTEREST_ONLY", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );
      const { quote } = await getLoanQuote(loan.id, "2024-03-01");
      expect(quote.accrualStart).toBe("2024-01-31");
      expect(quote.interestDue).toBe(200);
    });

    it("never writes interest for PRINCIPAL_ONLY", async () => {
      const loan = await openLoan();
      const result = await recordPayment(
        { loanId: loan.id, amount: 300, capitalExtra: 0, mode: "PRINCIPAL_ONLY", asOfDate: "2024-01-31", notes: "partial" },
        JAN_31,
      );
      expect(result.payments.map((p) => p.type)).toEqual(["PRINCIPAL"]);
      expect(result.loan.amount).toBe(700);
    });

    it("rejects principal above the balance", async () => {
      const loan = await openLoan();
      await expect(
        recordPayment(
          { loanId: loan.id, amount: 1500, capitalExtra: 0, mode: "PRINCIPAL_ONLY", asOfDate: "2024-01-31", notes: "" },
          JAN_31,
        ),
      ).rejects.toMatchObject({ status: 409, code: "PRINCIPAL_EXCEEDS_BALANCE" });
      expect((await getLoan(loan.id)).amount).toBe(1000);
      expect(await listReceipts(loan.id)).toEqual([]);
    });

    it("rejects an empty payment", async () => {
      const loan = await openLoan();
      await expect(
        recordPayment(
          { loanId: loan.id, amount: 0, capitalExtra: 0, mode: "AUTO", asOfDate: "2024-01-31", notes: "" },
          JAN_31,
        ),
      ).rejects.toMatchObject({ status: 400 });
    });

    it("only takes payments on active loans", async () => {
      const loan = await openLoan();
      await redeemLoan(loan.id, JAN_31);
      await expect(
        recordPayment(
          { loanId: loan.id, amount: 100, capitalExtra: 0, mode: "AUTO", asOfDate: "2024-01-31", notes: "" },
          JAN_31,
        ),
      ).rejects.toMatchObject({ status: 409, code: "LOAN_NOT_ACTIVE" });
    });

    it("reports an unknown loan", async () => {
      await expect(
        recordPayment(
          { loanId: "missing", amount: 100, capitalExtra: 0, mode: "AUTO", asOfDate: "2024-01-31", notes: "" },
          JAN_31,
        ),
      ).rejects.toMatchObject({ status: 404 });
    });
  });

  describe("receipts", () => {
    it("groups rows sharing a timestamp and prints the balance", async () => {
      const loan = await openLoan();
      const { payments } = await recordPayment(
        { loanId: loan.id, amount: 250, capitalExtra: 0, mode: "AUTO", asOfDate: "2024-01-31", notes: "cash" },
        JAN_31,
      );

      const receipts = await listReceipts(loan.id);
      expect(receipts).toEqual([
        {
          receiptId: payments[0].id,
          loanId: loan.id,
          paidAt: "2024-01-31 11:00:00",
          interestAmount: 200,
          principalAmount: 50,
          total: 250,
          notes: ["cash"],
        },
      ]);

      const detail = await getReceiptDetail(payments[1].id);
      expect(detail.originalPrincipal).toBe(1000);
      expect(detail.principalPaidToDate).toBe(50);
      expect(detail.balance).toBe(950);
      expect(detail.receipt.total).toBe(250);
    });
  });

  describe("undoReceipt", () => {
    it("restores principal and offsets the cash", async () => {
      const loan = await openLoan();
      await recordPayment(
        { loanId: loan.id, amount: 250, capitalExtra: 0, mode: "AUTO", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );

      const result = await undoReceipt(
        { loanId: loan.id, paidAt: "2024-01-31 11:00:00", reason: "wrong loan", reversedBy: "user-1" },
        new Date(2024, 0, 31, 12, 0, 0),
      );

      expect(result.loan.amount).toBe(1000);
      expect(result.movement).toMatchObject({ amount: -250, ref: "UNDO" });
      expect(result.reversal).toMatchObject({
        interestAmount: 200,
        principalAmount: 50,
        total: 250,
        reason: "wrong loan",
        reversedBy: "user-1",
        reversedAt: "2024-01-31 12:00:00",
      });
      expect(await listReceipts(loan.id)).toEqual([]);
      expect(await listReversals(loan.id)).toEqual([result.reversal]);
      expect((await listCashMovements("2024-01-31")).map((m) => m.amount)).toEqual([250, -250]);
    });

    it("finds the receipt from any of its payment ids", async () => {
      const loan = await openLoan();
      const { payments } = await recordPayment(
        { loanId: loan.id, amount: 250, capitalExtra: 0, mode: "AUTO", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );
      const result = await undoReceipt(
        { loanId: loan.id, receiptId: payments[1].id, reason: "typo", reversedBy: "user-1" },
        JAN_31,
      );
      expect(result.reversal.paidAt).toBe("2024-01-31 11:00:00");
      expect(result.loan.amount).toBe(1000);
    });

    it("rolls back the renewal an interest-only receipt made", async () => {
      const loan = await openLoan();
      const paid = await recordPayment(
        { loanId: loan.id, amount: 200, capitalExtra: 0, mode: "INTEREST_ONLY", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );
      expect(paid.loan.dueDate).toBe("2024-04-30");

      const result = await undoReceipt(
        { loanId: loan.id, paidAt: "2024-01-31 11:00:00", reason: "charged twice", reversedBy: "user-1" },
        JAN_31,
      );
      expect(result.loan.dueDate).toBe("2024-03-31");
      expect(result.loan.amount).toBe(1000);
    });

    it("keeps the due date a later renewal set", async () => {
      const loan = await openLoan();
      await recordPayment(
        { loanId: loan.id, amount: 200, capitalExtra: 0, mode: "INTEREST_ONLY", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );
      const second = await recordPayment(
        { loanId: loan.id, amount: 200, capitalExtra: 0, mode: "INTEREST_ONLY", asOfDate: "2024-03-01", notes: "" },
        new Date(2024, 2, 1, 11, 0, 0),
      );
      expect(second.loan.dueDate).toBe("2024-05-30");

      const result = await undoReceipt(
        { loanId: loan.id, paidAt: "2024-01-31 11:00:00", reason: "duplicate", reversedBy: "user-1" },
        new Date(2024, 2, 1, 12, 0, 0),
      );
      expect(result.loan.dueDate).toBe("2024-05-30");
    });

    it("requires a reason and an existing receipt", async () => {
      const loan = await openLoan();
      await expect(
        undoReceipt({ loanId: loan.id, paidAt: "2024-01-31 11:00:00", reason: " ", reversedBy: "user-1" }),
      ).rejects.toMatchObject({ status: 400 });
      await expect(
        undoReceipt({ loanId: loan.id, paidAt: "2024-01-31 11:00:00", reason: "x", reversedBy: "user-1" }),
      ).rejects.toMatchObject({ status: 404 });
    });
  });

  describe("status transitions", () => {
    it("moves a forfeited item through inventory to sale", async () => {
      const loan = await openLoan();
      const { loan: lost, item } = await markLoanLost(loan.id, JAN_31);
      expect(lost.status).toBe("LOST");
      expect(item).toMatchObject({ loanId: loan.id, status: "FOR_SALE" });

      const sale = await sellInventoryLoan(loan.id, 300, new Date(2024, 1, 5, 9, 0, 0));
      expect(sale.loan.status).toBe("SOLD");
      expect(sale.movement).toMatchObject({ amount: 300, ref: "INVENTORY_SALE" });
      expect((await listInventory()).map((entry) => entry.status)).toEqual(["SOLD"]);
    });

    it("rejects transitions out of a closed state", async () => {
      const loan = await openLoan();
      const redeemed = await redeemLoan(loan.id, JAN_31);
      expect(redeemed.redeemedAt).toBe("2024-01-31 11:00:00");
      await expect(markLoanLost(loan.id)).rejects.toMatchObject({ status: 409 });
      await expect(redeemLoan(loan.id)).rejects.toMatchObject({ status: 409 });
      await expect(sellInventoryLoan(loan.id, 100)).rejects.toMatchObject({ status: 409 });
    });
  });

  describe("cash and reports", () => {
    it("summarizes a day by customer", async () => {
      const ana = await openLoan();
      const bruno = await openLoan({ customerName: "Bruno Diaz", customerId: "27999888", amount: 500 });
      await recordPayment(
        { loanId: ana.id, amount: 250, capitalExtra: 0, mode: "AUTO", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );
      await recordPayment(
        { loanId: bruno.id, amount: 100, capitalExtra: 0, mode: "INTEREST_ONLY", asOfDate: "2024-01-31", notes: "" },
        JAN_31,
      );

      const report = await getCashDailyReport("2024-01-31");
      expect(report.rows).toEqual([
        { customerName: "Ana Perez", interest: 200, principal: 50, total: 250, loansCount: 1, paymentsCount: 2 },
        { customerName: "Bruno Diaz", interest: 100, principal: 0, total: 100, loansCount: 1, paymentsCount: 1 },
      ]);
      expect(report.totalInterest).toBe(300);
      expect(report.totalPrincipal).toBe(50);
      expect(report.total).toBe(350);

      const filtered = await getCashDailyReport("2024-01-31", "bruno");
      expect(filtered.rows.map((row) => row.customerName)).toEqual(["Bruno Diaz"]);

      const interest = await getReport("interest", "2024-01-01", "2024-01-31");
      expect(interest.kind === "interest" && interest.total).toBe(300);
      const principal = await getReport("principal", "2024-01-01", "2024-01-31");
      expect(principal.kind === "principal" && principal.total).toBe(50);
    });

    it("lists loans coming due on the dashboard", async () => {
      const loan = await openLoan();
      const dashboard = await getDashboard(new Date(2024, 2, 28, 9, 0, 0));
      expect(dashboard.activeLoans).toBe(1);
      expect(dashboard.principalInCustody).toBe(1000);
      expect(dashboard.cashToday).toBe(0);
      expect(dashboard.upcoming.map((entry) => entry.id)).toEqual([loan.id]);

      const risk = await getReport("risk", "2024-03-28", "2024-03-28", new Date(2024, 2, 20, 9, 0, 0));
      expect(risk.kind === "risk" && risk.loans).toEqual([]);
    });
  });

  describe("retail sales", () => {
    it("takes the cash for an item only once", async () => {
      const before = await getSalesSnapshot();
      const item = await createSale("Silver chain", 80, JAN_31);
      const sold = await markSaleSold(item.id, JAN_31);
      expect(sold.item.status).toBe("SOLD");
      expect(sold.movement).toMatchObject({ amount: 80, ref: "SALE" });

      await expect(markSaleSold(item.id, JAN_31)).rejects.toMatchObject({
        status: 409,
        code: "INVALID_STATUS",
      });
      expect(
        (await listCashMovements("2024-01-31")).filter((movement) => movement.ref === "SALE"),
      ).toEqual([sold.movement]);

      const after = await getSalesSnapshot();
      expect(after.soldCount).toBe(before.soldCount + 1);
      expect(after.soldTotal).toBe(before.soldTotal + 80);
    });
  });

  describe("concurrent writes", () => {
    it("commits a plain write made while another transaction rolls back", async () => {
      const pending: Promise<Client>[] = [];
      await expect(
        withTransaction(async (conn) => {
          await conn.execute(
            `INSERT INTO clients (id, name, document, phone, address, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
            ["rolled-back-client", "Carla Rollback", "11222333", "", "", "2024-01-31 11:00:00"],
          );
          pending.push(createClient({ name: "Bob Queue", document: "20333444" }, JAN_31));
          throw new Error("boom");
        }),
      ).rejects.toThrow("boom");
      await Promise.all(pending);

      expect((await listClients("Bob Queue")).map((client) => client.document)).toEqual(["20333444"]);
      expect(await listClients("Carla Rollback")).toEqual([]);
    });
  });

  describe("settings", () => {
    it("validates updates", async () => {
      await expect(updateSettings({ defaultTermDays: -5 })).rejects.toMatchObject({ status: 400 });
      const updated = await updateSettings({ defaultTermDays: 60 });
      expect(updated.defaultTermDays).toBe(60);
      const { loan } = await createLoan(opening, JAN_1);
      expect(loan.dueDate).toBe("2024-03-01");
      await updateSettings({ defaultTermDays: 90 });
    });
  });
});
