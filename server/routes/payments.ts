import type { PaymentMode } from "@shared/pawn";
import { formatLocalDate } from "@shared/interest";
import {
  getReceiptDetail,
  listReceipts,
  listReversals,
  recordPayment,
  undoReceipt,
} from "../store/payments";
import { formatTimestamp } from "../store/rows";
import { authedRoute, confirmPassword } from "../lib/http";
import { ValidationError } from "../utils/http-error";
import { parseBody } from "../utils/parse-body";
import {
  oneOf,
  optionalDate,
  optionalNumber,
  optionalText,
  text,
} from "../utils/fields";

const MODES: readonly PaymentMode[] = ["AUTO", "INTEREST_ONLY", "PRINCIPAL_ONLY"];

export const listReceiptsHandler = authedRoute("payments", async (req, res) => {
  res.json(await listReceipts(req.params.id));
});

export const listReversalsHandler = authedRoute("payments", async (req, res) => {
  res.json(await listReversals(req.params.id));
});

export const createPaymentHandler = authedRoute("payments", async (req, res) => {
  const body = parseBody(req.body);
  const rawMode = text(body.mode).toUpperCase();
  const mode = rawMode ? oneOf(rawMode, MODES) : "AUTO";
  if (!mode) throw new ValidationError("Invalid mode");

  const result = await recordPayment({
    loanId: req.params.id,
    amount: optionalNumber(body.amount, 0, "amount"),
    capitalExtra: optionalNumber(body.capitalExtra, 0, "capitalExtra"),
    mode,
    asOfDate: optionalDate(body.asOfDate, "asOfDate") ?? formatLocalDate(new Date()),
    fromDate: optionalDate(body.fromDate, "fromDate") ?? null,
    notes: text(body.notes),
  });
  res.status(201).json(result);
});

export const undoPaymentHandler = authedRoute(
  "payments",
  async (req, res, auth) => {
    const body = parseBody(req.body);
    await confirmPassword(auth, body);
    const paidAt = optionalText(body.paidAt);
    const result = await undoReceipt({
      loanId: req.params.id,
      paidAt: paidAt ? (formatTimestamp(paidAt) ?? undefined) : undefined,
      receiptId: optionalText(body.receiptId),
      reason: text(body.reason),
      reversedBy: auth.user.id,
    });
    // eslint-disable-next-line no-console
    console.log(
      `[payments] ${auth.user.username} reversed receipt ${result.reversal.paidAt} on loan ${result.loan.id}`,
    );
    res.json(result);
  },
  { admin: true },
);

export const receiptHandler = authedRoute("payments", async (req, res) => {
  res.json(await getReceiptDetail(req.params.id));
});
