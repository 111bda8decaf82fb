import { listInventory, sellInventoryLoan } from "../store/inventory";
import { authedRoute } from "../lib/http";
import { parseBody } from "../utils/parse-body";
import { ensureNumber } from "../utils/fields";

export const listInventoryHandler = authedRoute("inventory", async (_req, res) => {
  res.json(await listInventory());
});

export const sellInventoryHandler = authedRoute("inventory", async (req, res) => {
  const body = parseBody(req.body);
  res.json(await sellInventoryLoan(req.params.loanId, ensureNumber(body.price)));
});
