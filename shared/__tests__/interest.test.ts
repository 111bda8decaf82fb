import { describe, expect, it } from "vitest";
import {
  accrualStart,
  addDays,
  allocatePayment,
  buildTicketMessage,
  daysBetween,
  interestDue,
  isIsoDate,
  isMonthKey,
  loanQuote,
  monthlyBreakdown,
  monthsOverdue,
  monthsRange,
  nextInterestDueDate,
  normalizePhone,
  renewedDueDate,
  settlesInterest,
} from "../interest";
import type { Loan } from "../pawn";

const loan: Loan = {
  id: "L1",
  createdAt: "2024-01-01 10:00:00",
  itemName: "Gold ring",
  weightGrams: 5.5,
  customerName: "Ana Perez",
  customerId: "30111222",
  phone: "+54 11 5555-1234",
  amount: 1000,
  interestRate: 20,
  dueDate: "2024-03-31",
  status: "ACTIVE",
  photoPath: "",
  idFrontPath: "",
  idBackPath: "",
  signaturePath: "",
  redeemedAt: null,
};

describe("calendar helpers", () => {
  it("counts calendar days across a leap day", () => {
    expect(daysBetween("2024-02-28", "2024-03-01")).toBe(2);
    expect(daysBetween("2024-03-01", "2024-02-28")).toBe(-2);
  });

  it("ignores the time part of timestamps", () => {
    expect(daysBetween("2024-01-01 23:59:59", "2024-01-02 00:00:01")).toBe(1);
  });

  it("adds days across month ends", () => {
    expect(addDays("2024-01-01", 90)).toBe("2024-03-31");
    expect(addDays("2023-12-31", 1)).toBe("2024-01-01");
  });

  it("validates dates and month keys", () => {
    expect(isIsoDate("2024-02-29")).toBe(true);
    expect(isIsoDate("2023-02-29")).toBe(false);
    expect(isIsoDate("2024-2-1")).toBe(false);
    expect(isMonthKey("2024-12")).toBe(true);
    expect(isMonthKey("2024-13")).toBe(false);
  });
});

describe("accrualStart", () => {
  it("starts at creation when no interest was paid", () => {
    expect(accrualStart("2024-01-01 10:00:00", null)).toBe("2024-01-01");
  });

  it("starts at the last interest payment", () => {
    expect(accrualStart("2024-01-01 10:00:00", "2024-02-01 09:30:00")).toBe("2024-02-01");
  });

  it("lets an explicit override win", () => {
    expect(accrualStart("2024-01-01 10:00:00", "2024-02-01 09:30:00", "2024-01-15")).toBe(
      "2024-01-15",
    );
  });
});

describe("interestDue", () => {
  it("charges 20% of 1000 over a 30 day month", () => {
    expect(
      interestDue({ principal: 1000, monthlyRate: 20, start: "2024-01-01", asOf: "2024-01-31" }),
    ).toBe(200);
  });

  it("charges at least one day", () => {
    const sameDay = interestDue({
      principal: 1000,
      monthlyRate: 20,
      start: "2024-01-01",
      asOf: "2024-01-01",
    });
    expect(sameDay).toBeCloseTo(20 / 3, 10);
    expect(
      interestDue({ principal: 1000, monthlyRate: 20, start: "2024-01-10", asOf: "2024-01-01" }),
    ).toBe(sameDay);
  });

  it("never decreases as the as-of date moves forward", () => {
    let previous = 0;
    for (let day = 0; day < 120; day += 7) {
      const due = interestDue({
        principal: 750,
        monthlyRate: 12.5,
        start: "2024-01-01",
        asOf: addDays("2024-01-01", day),
      });
      expect(due).toBeGreaterThanOrEqual(previous);
      previous = due;
    }
  });

  it("is zero for a fully repaid loan", () => {
    expect(
      interestDue({ principal: 0, monthlyRate: 20, start: "2024-01-01", asOf: "2024-03-01" }),
    ).toBe(0);
  });
});

describe("allocatePayment", () => {
  it("pays interest first in AUTO mode", () => {
    expect(allocatePayment({ amount: 250, mode: "AUTO", interestDue: 200 })).toEqual({
      toInterest: 200,
      toPrincipal: 50,
    });
  });

  it("puts everything on interest when AUTO falls short", () => {
    expect(allocatePayment({ amount: 150, mode: "AUTO", interestDue: 200 })).toEqual({
      toInterest: 150,
      toPrincipal: 0,
    });
  });

  it("floors AUTO interest to the cent", () => {
    const allocation = allocatePayment({ amount: 10, mode: "AUTO", interestDue: 20 / 3 });
    expect(allocation).toEqual({ toInterest: 6.66, toPrincipal: 3.34 });
    expect(allocation.toInterest).toBeLessThanOrEqual(20 / 3);
  });

  it("adds extra principal in AUTO mode", () => {
    expect(
      allocatePayment({ amount: 200, capitalExtra: 100, mode: "AUTO", interestDue: 200 }),
    ).toEqual({ toInterest: 200, toPrincipal: 100 });
  });

  it("keeps INTEREST_ONLY on interest even above what is due", () => {
    expect(allocatePayment({ amount: 300, mode: "INTEREST_ONLY", interestDue: 200 })).toEqual({
      toInterest: 300,
      toPrincipal: 0,
    });
    expect(
      allocatePayment({ amount: 300, capitalExtra: 100, mode: "INTEREST_ONLY", interestDue: 200 }),
    ).toEqual({ toInterest: 300, toPrincipal: 100 });
  });

  it("never writes interest in PRINCIPAL_ONLY mode", () => {
    expect(
      allocatePayment({ amount: 100, capitalExtra: 50, mode: "PRINCIPAL_ONLY", interestDue: 200 }),
    ).toEqual({ toInterest: 0, toPrincipal: 150 });
  });
});

describe("renewal", () => {
  it("renews only when interest is covered and no principal is paid", () => {
    expect(settlesInterest({ toInterest: 200, toPrincipal: 0 }, 200)).toBe(true);
    expect(settlesInterest({ toInterest: 199.5, toPrincipal: 0 }, 200)).toBe(false);
    expect(settlesInterest({ toInterest: 200, toPrincipal: 50 }, 200)).toBe(false);
  });

  it("extends from the later of payment date and due date", () => {
    expect(renewedDueDate("2024-03-10", "2024-03-31", 30)).toBe("2024-04-30");
    expect(renewedDueDate("2024-04-05", "2024-03-31", 30)).toBe("2024-05-05");
  });
});

describe("monthlyBreakdown", () => {
  it("projects a flat monthly interest", () => {
    expect(monthlyBreakdown(1000, 20, "2024-01", "2024-03")).toEqual({
      rows: [
        { month: "2024-01", interest: 200 },
        { month: "2024-02", interest: 200 },
        { month: "2024-03", interest: 200 },
      ],
      total: 600,
    });
  });

  it("returns nothing when from is after to", () => {
    expect(monthlyBreakdown(1000, 20, "2024-05", "2024-03")).toEqual({ rows: [], total: 0 });
  });

  it("crosses year boundaries", () => {
    expect(monthsRange("2023-11", "2024-02")).toEqual([
      "2023-11",
      "2023-12",
      "2024-01",
      "2024-02",
    ]);
  });
});

describe("loan position", () => {
  it("computes the next interest date and overdue months", () => {
    expect(nextInterestDueDate("2024-01-01 10:00:00", null)).toBe("2024-01-31");
    expect(nextInterestDueDate("2024-01-01 10:00:00", "2024-02-10 12:00:00")).toBe("2024-03-11");
    expect(monthsOverdue("2024-01-01", "2024-03-05")).toBe(2);
    expect(monthsOverdue("2024-01-01", "2024-01-01")).toBe(0);
  });

  it("quotes today and at the due date", () => {
    expect(
      loanQuote({ loan, lastInterestPaidAt: null, principalPaid: 0, asOf: "2024-01-31" }),
    ).toEqual({
      asOf: "2024-01-31",
      accrualStart: "2024-01-01",
      interestDue: 200,
      totalDue: 1200,
      interestAtDueDate: 600,
      totalAtDueDate: 1600,
      nextInterestDueDate: "2024-01-31",
      monthsOverdue: 1,
      originalPrincipal: 1000,
    });
  });

  it("reports the original principal after partial repayment", () => {
    const quote = loanQuote({
      loan: { ...loan, amount: 950 },
      lastInterestPaidAt: "2024-01-31 11:00:00",
      principalPaid: 50,
      asOf: "2024-01-31",
    });
    expect(quote.originalPrincipal).toBe(1000);
    expect(quote.accrualStart).toBe("2024-01-31");
  });
});

describe("ticket", () => {
  it("normalizes phone numbers", () => {
    expect(normalizePhone(" +54 (11) 5555-1234 ")).toBe("+541155551234");
    expect(normalizePhone("011-555")).toBe("011555");
  });

  it("builds a plain-text ticket", () => {
    const quote = loanQuote({ loan, lastInterestPaidAt: null, principalPaid: 0, asOf: "2024-01-31" });
    expect(buildTicketMessage("Test Shop", loan, quote).split("\n")).toEqual([
      "Test Shop - Ticket #L1",
      "Date: 2024-01-01",
      "Customer: Ana Perez (ID 30111222)",
      "Item: Gold ring - 5.50 g",
      "Principal: $1000.00",
      "Monthly interest: 20.00%",
      "Due date: 2024-03-31",
      "Next interest due: 2024-01-31",
      "Interest to date: $200.00",
      "Total to date: $1200.00",
      "Interest at due date: $600.00",
      "Total at due date: $1600.00",
    ]);
  });
});
