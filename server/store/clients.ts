import crypto from "node:crypto";
import { formatLocalTimestamp } from "@shared/interest";
import type { Client, ClientCreateInput } from "@shared/pawn";
import { getInitializedPool } from "../lib/mysql";
import { NotFoundError, ValidationError } from "../utils/http-error";
import { mapClientRow, type ClientRow } from "./rows";

const CLIENT_COLUMNS = `id, name, document, phone, address, created_at`;

export async function listClients(q = ""): Promise<Client[]> {
  const db = await getInitializedPool();
  const needle = q.trim();
  const rows = needle
    ? await db.select<ClientRow>(
        `SELECT ${CLIENT_COLUMNS} FROM clients
         WHERE name LIKE ? OR document LIKE ? OR phone LIKE ?
         ORDER BY name ASC, id ASC`,
        [`%${needle}%`, `%${needle}%`, `%${needle}%`],
      )
    : await db.select<ClientRow>(
        `SELECT ${CLIENT_COLUMNS} FROM clients ORDER BY name ASC, id ASC`,
      );
  return rows.map(mapClientRow);
}

export async function createClient(
  input: ClientCreateInput,
  now = new Date(),
): Promise<Client> {
  const name = input.name.trim();
  const document = input.document.trim();
  if (!name || !document) {
    throw new ValidationError("Name and document are required");
  }
  const db = await getInitializedPool();
  const client: Client = {
    id: crypto.randomUUID(),
    name,
    document,
    phone: input.phone?.trim() ?? "",
    address: input.address?.trim() ?? "",
    createdAt: formatLocalTimestamp(now),
  };
  await db.execute(
    `INSERT INTO clients (id, name, document, phone, address, created_at) VALUES (?, ?, ?, ?, ?, ?)`,
    [client.id, client.name, client.document, client.phone, client.address, client.createdAt],
  );
  return client;
}

export async function deleteClient(clientId: string): Promise<void> {
  const db = await getInitializedPool();
  const header = await db.execute(`DELETE FROM clients WHERE id = ?`, [clientId]);
  if (header.affectedRows === 0) throw new NotFoundError("Client not found");
}
