import { createClient, deleteClient, listClients } from "../store/clients";
import { authedRoute, confirmPassword, queryParam } from "../lib/http";
import { parseBody } from "../utils/parse-body";
import { optionalText, text } from "../utils/fields";

export const listClientsHandler = authedRoute("clients", async (req, res) => {
  res.json(await listClients(queryParam(req, "q")));
});

export const createClientHandler = authedRoute("clients", async (req, res) => {
  const body = parseBody(req.body);
  const client = await createClient({
    name: text(body.name),
    document: text(body.document),
    phone: optionalText(body.phone),
    address: optionalText(body.address),
  });
  res.status(201).json(client);
});

export const deleteClientHandler = authedRoute("clients", async (req, res, auth) => {
  await confirmPassword(auth, parseBody(req.body));
  await deleteClient(req.params.id);
  res.status(204).end();
});
