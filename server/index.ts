import "dotenv/config";
import express from "express";
import cors from "cors";
import {
  loginHandler,
  logoutHandler,
  meHandler,
  recoverHandler,
  resetHandler,
} from "./routes/auth";
import {
  createUserHandler,
  deleteUserHandler,
  listUsersHandler,
} from "./routes/users";
import {
  createLoanHandler,
  deleteLoanHandler,
  exportLoansHandler,
  getLoanHandler,
  listLoansHandler,
  loanBreakdownHandler,
  loanDocumentsHandler,
  loanInterestHandler,
  loanTicketHandler,
  markLostHandler,
  redeemLoanHandler,
  updateLoanHandler,
} from "./routes/loans";
import {
  createPaymentHandler,
  listReceiptsHandler,
  listReversalsHandler,
  receiptHandler,
  undoPaymentHandler,
} from "./routes/payments";
import {
  cashDailyHandler,
  cashMovementsHandler,
  dashboardHandler,
  reportHandler,
} from "./routes/cash";
import { listInventoryHandler, sellInventoryHandler } from "./routes/inventory";
import {
  createSaleHandler,
  deleteSaleHandler,
  markSaleSoldHandler,
  salesSnapshotHandler,
} from "./routes/sales";
import {
  createClientHandler,
  deleteClientHandler,
  listClientsHandler,
} from "./routes/clients";
import {
  getSettingsHandler,
  resetSystemHandler,
  updateSettingsHandler,
} from "./routes/settings";
import { getConfig } from "./lib/config";
import { initializeDatabase } from "./lib/mysql";

export function createServer() {
  const app = express();

  initializeDatabase().catch((error: unknown) => {
    // eslint-disable-next-line no-console
    console.error("[db] initialization failed", error);
  });

  // Middleware; document uploads arrive as base64 data URLs
  app.use(cors());
  app.use(express.json({ limit: "25mb" }));
  app.use(express.urlencoded({ extended: true, limit: "25mb" }));

  // Health
  app.get("/health", (_req, res) => res.status(200).json({ status: "ok" }));

  // Uploaded photos, ID scans and signatures
  app.use("/uploads", express.static(getConfig().uploadDir));

  // Auth
  app.post("/api/auth/login", loginHandler);
  app.get("/api/auth/me", meHandler);
  app.post("/api/auth/logout", logoutHandler);
  app.post("/api/auth/recover", recoverHandler);
  app.post("/api/auth/reset", resetHandler);

  // Users (admin)
  app.get("/api/users", listUsersHandler);
  app.post("/api/users", createUserHandler);
  app.delete("/api/users/:id", deleteUserHandler);

  // Loans
  app.get("/api/loans", listLoansHandler);
  app.post("/api/loans", createLoanHandler);
  app.get("/api/loans/export.csv", exportLoansHandler);
  app.get("/api/loans/:id", getLoanHandler);
  app.put("/api/loans/:id", updateLoanHandler);
  app.delete("/api/loans/:id", deleteLoanHandler);
  app.post("/api/loans/:id/redeem", redeemLoanHandler);
  app.post("/api/loans/:id/lost", markLostHandler);
  app.get("/api/loans/:id/interest", loanInterestHandler);
  app.get("/api/loans/:id/breakdown", loanBreakdownHandler);
  app.get("/api/loans/:id/ticket", loanTicketHandler);
  app.put("/api/loans/:id/documents", loanDocumentsHandler);

  // Payments
  app.get("/api/loans/:id/payments", listReceiptsHandler);
  app.post("/api/loans/:id/payments", createPaymentHandler);
  app.post("/api/loans/:id/payments/undo", undoPaymentHandler);
  app.get("/api/loans/:id/reversals", listReversalsHandler);
  app.get("/api/payments/:id/receipt", receiptHandler);

  // Cash & reports
  app.get("/api/dashboard", dashboardHandler);
  app.get("/api/cash", cashDailyHandler);
  app.get("/api/cash/movements", cashMovementsHandler);
  app.get("/api/reports", reportHandler);

  // Inventory of forfeited items
  app.get("/api/inventory", listInventoryHandler);
  app.post("/api/inventory/:loanId/sell", sellInventoryHandler);

  // Retail sales
  app.get("/api/sales", salesSnapshotHandler);
  app.post("/api/sales", createSaleHandler);
  app.post("/api/sales/:id/sold", markSaleSoldHandler);
  app.delete("/api/sales/:id", deleteSaleHandler);

  // Clients
  app.get("/api/clients", listClientsHandler);
  app.post("/api/clients", createClientHandler);
  app.delete("/api/clients/:id", deleteClientHandler);

  // Settings & system (admin)
  app.get("/api/settings", getSettingsHandler);
  app.put("/api/settings", updateSettingsHandler);
  app.post("/api/system/reset", resetSystemHandler);

  return app;
}
