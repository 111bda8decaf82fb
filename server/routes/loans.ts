import type {
  LoanCreateInput,
  LoanStatus,
  LoanUpdateInput,
} from "@shared/pawn";
import { isMonthKey } from "@shared/interest";
import {
  createLoan,
  deleteLoan,
  exportLoansCsv,
  getLoan,
  getLoanBreakdown,
  getLoanQuote,
  getLoanTicket,
  listLoans,
  redeemLoan,
  updateLoan,
  updateLoanDocuments,
} from "../store/loans";
import { markLoanLost } from "../store/inventory";
import { authedRoute, confirmPassword, queryParam } from "../lib/http";
import { ValidationError } from "../utils/http-error";
import { parseBody, type FormBody } from "../utils/parse-body";
import {
  ensureNumber,
  oneOf,
  optionalDate,
  optionalNumber,
  optionalText,
  text,
} from "../utils/fields";

const STATUSES: readonly LoanStatus[] = ["ACTIVE", "REDEEMED", "LOST", "SOLD"];

function parseLoanCreate(body: FormBody): LoanCreateInput {
  const customerName = text(body.customerName);
  const customerId = text(body.customerId);
  const phone = text(body.phone);
  const itemName = text(body.itemName);
  const startDate = optionalDate(body.startDate, "startDate");
  if (!customerName || !customerId || !phone || !itemName || !startDate) {
    throw new ValidationError("Missing required fields");
  }
  const amount = ensureNumber(body.amount);
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new ValidationError("Amount must be greater than zero");
  }
  const weightGrams = optionalNumber(body.weightGrams, 0, "weightGrams");
  if (weightGrams < 0) throw new ValidationError("Invalid weightGrams");
  const interestRate =
    body.interestRate == null || text(body.interestRate) === ""
      ? undefined
      : optionalNumber(body.interestRate, 0, "interestRate");
  if (interestRate !== undefined && interestRate <= 0) {
    throw new ValidationError("Invalid interestRate");
  }
  return {
    customerName,
    customerId,
    phone,
    itemName,
    weightGrams,
    amount,
    interestRate,
    startDate,
  };
}

function parseLoanUpdate(body: FormBody): LoanUpdateInput {
  const patch: LoanUpdateInput = {
    itemName: optionalText(body.itemName),
    customerName: optionalText(body.customerName),
    customerId: optionalText(body.customerId),
    phone: optionalText(body.phone),
    dueDate: optionalDate(body.dueDate, "dueDate"),
  };
  if (body.weightGrams !== undefined) {
    const weightGrams = optionalNumber(body.weightGrams, 0, "weightGrams");
    if (weightGrams < 0) throw new ValidationError("Invalid weightGrams");
    patch.weightGrams = weightGrams;
  }
  if (body.interestRate !== undefined) {
    const interestRate = ensureNumber(body.interestRate);
    if (!Number.isFinite(interestRate) || interestRate <= 0) {
      throw new ValidationError("Invalid interestRate");
    }
    patch.interestRate = interestRate;
  }
  return patch;
}

export const listLoansHandler = authedRoute("loans", async (req, res) => {
  const status = queryParam(req, "status");
  res.json(
    await listLoans({
      q: queryParam(req, "q"),
      status: status ? oneOf(status.toUpperCase(), STATUSES) : undefined,
    }),
  );
});

export const createLoanHandler = authedRoute("loans", async (req, res) => {
  const result = await createLoan(parseLoanCreate(parseBody(req.body)));
  res.status(201).json(result);
});

export const getLoanHandler = authedRoute("loans", async (req, res) => {
  res.json(await getLoan(req.params.id));
});

export const updateLoanHandler = authedRoute("loans", async (req, res) => {
  res.json(await updateLoan(req.params.id, parseLoanUpdate(parseBody(req.body))));
});

export const deleteLoanHandler = authedRoute("loans", async (req, res, auth) => {
  await confirmPassword(auth, parseBody(req.body));
  await deleteLoan(req.params.id);
  res.status(204).end();
});

export const redeemLoanHandler = authedRoute("loans", async (req, res) => {
  res.json(await redeemLoan(req.params.id));
});

export const markLostHandler = authedRoute("loans", async (req, res) => {
  res.json(await markLoanLost(req.params.id));
});

export const loanInterestHandler = authedRoute("loans", async (req, res) => {
  const asOf = optionalDate(queryParam(req, "asOf"), "asOf");
  const from = optionalDate(queryParam(req, "from"), "from");
  res.json(await getLoanQuote(req.params.id, asOf, from));
});

export const loanBreakdownHandler = authedRoute("loans", async (req, res) => {
  const fromMonth = queryParam(req, "fromMonth");
  const toMonth = queryParam(req, "toMonth");
  if (!isMonthKey(fromMonth) || !isMonthKey(toMonth)) {
    throw new ValidationError("fromMonth and toMonth must be YYYY-MM");
  }
  res.json(await getLoanBreakdown(req.params.id, fromMonth, toMonth));
});

export const loanTicketHandler = authedRoute("loans", async (req, res) => {
  res.json(await getLoanTicket(req.params.id));
});

export const loanDocumentsHandler = authedRoute("loans", async (req, res) => {
  const body = parseBody(req.body);
  const documents = {
    photo: optionalText(body.photo),
    idFront: optionalText(body.idFront),
    idBack: optionalText(body.idBack),
    signature: optionalText(body.signature),
  };
  if (!documents.photo && !documents.idFront && !documents.idBack && !documents.signature) {
    throw new ValidationError("No documents provided");
  }
  res.json(await updateLoanDocuments(req.params.id, documents));
});

export const exportLoansHandler = authedRoute("loans", async (_req, res) => {
  const csv = await exportLoansCsv();
  res.setHeader("Content-Type", "text/csv; charset=utf-8");
  res.setHeader("Content-Disposition", 'attachment; filename="loans.csv"');
  res.send(csv);
});
