import {
  createSale,
  deleteSale,
  getSalesSnapshot,
  markSaleSold,
} from "../store/sales";
import { authedRoute, confirmPassword } from "../lib/http";
import { parseBody } from "../utils/parse-body";
import { ensureNumber, text } from "../utils/fields";

export const salesSnapshotHandler = authedRoute("sales", async (_req, res) => {
  res.json(await getSalesSnapshot());
});

export const createSaleHandler = authedRoute("sales", async (req, res) => {
  const body = parseBody(req.body);
  res.status(201).json(await createSale(text(body.itemDesc), ensureNumber(body.price)));
});

export const markSaleSoldHandler = authedRoute("sales", async (req, res) => {
  res.json(await markSaleSold(req.params.id));
});

export const deleteSaleHandler = authedRoute("sales", async (req, res, auth) => {
  await confirmPassword(auth, parseBody(req.body));
  await deleteSale(req.params.id);
  res.status(204).end();
});
