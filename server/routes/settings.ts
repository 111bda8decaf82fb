import type { ShopSettings } from "@shared/pawn";
import { getSettings, updateSettings } from "../store/settings";
import { resetLedger } from "../store/system";
import { authedRoute, confirmPassword } from "../lib/http";
import { parseBody } from "../utils/parse-body";

export const SECRET_MASK = "********";

function publicSettings(settings: ShopSettings): ShopSettings {
  return { ...settings, smtpPass: settings.smtpPass ? SECRET_MASK : "" };
}

export const getSettingsHandler = authedRoute(
  "settings",
  async (_req, res) => {
    res.json(publicSettings(await getSettings()));
  },
  { admin: true },
);

export const updateSettingsHandler = authedRoute(
  "settings",
  async (req, res) => {
    const body = parseBody(req.body);
    // the masked value echoed back by a form means "unchanged"
    const { smtpPass, ...rest } = body;
    const patch = smtpPass === SECRET_MASK ? rest : body;
    res.json(publicSettings(await updateSettings(patch)));
  },
  { admin: true },
);

export const resetSystemHandler = authedRoute(
  "system",
  async (req, res, auth) => {
    await confirmPassword(auth, parseBody(req.body));
    await resetLedger();
    res.status(204).end();
  },
  { admin: true },
);
