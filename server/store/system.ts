import { withTransaction } from "../lib/mysql";
import { clearUploads } from "../lib/uploads";

/**
 * Wipes the ledger: loans, payments, reversals, inventory and cash. Users,
 * clients, retail sales and settings are kept.
 */
export async function resetLedger(): Promise<void> {
  await withTransaction(async (conn) => {
    await conn.execute(`DELETE FROM payment_reversals`);
    await conn.execute(`DELETE FROM payments`);
    await conn.execute(`DELETE FROM inventory_items`);
    await conn.execute(`DELETE FROM cash_movements`);
    await conn.execute(`DELETE FROM loans`);
  });
  await clearUploads();
  // eslint-disable-next-line no-console
  console.log("[system] ledger reset");
}
