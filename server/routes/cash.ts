import type { ReportKind } from "@shared/pawn";
import { formatLocalDate } from "@shared/interest";
import {
  getCashDailyReport,
  getDashboard,
  getReport,
  listCashMovements,
} from "../store/cash";
import { authedRoute, queryParam } from "../lib/http";
import { ValidationError } from "../utils/http-error";
import { oneOf, optionalDate } from "../utils/fields";

const REPORT_KINDS: readonly ReportKind[] = ["interest", "principal", "risk"];

function dateParam(value: string | undefined, field: string) {
  return optionalDate(value, field) ?? formatLocalDate(new Date());
}

export const dashboardHandler = authedRoute("cash", async (_req, res) => {
  res.json(await getDashboard());
});

export const cashDailyHandler = authedRoute("cash", async (req, res) => {
  res.json(
    await getCashDailyReport(dateParam(queryParam(req, "date"), "date"), queryParam(req, "q")),
  );
});

export const cashMovementsHandler = authedRoute("cash", async (req, res) => {
  res.json(await listCashMovements(dateParam(queryParam(req, "date"), "date")));
});

export const reportHandler = authedRoute("reports", async (req, res) => {
  const kind = oneOf(queryParam(req, "kind"), REPORT_KINDS);
  if (!kind) throw new ValidationError("kind must be interest, principal or risk");
  const from = dateParam(queryParam(req, "from"), "from");
  const to = dateParam(queryParam(req, "to"), "to");
  if (from > to) throw new ValidationError("from must not be after to");
  res.json(await getReport(kind, from, to));
});
