import nodemailer from "nodemailer";
import type { ShopSettings } from "@shared/pawn";

export interface MailMessage {
  to: string;
  subject: string;
  text: string;
}

/**
 * Sends through the SMTP server in the shop settings. Without one the message
 * is printed to the console and `false` comes back.
 */
export async function sendMail(
  settings: ShopSettings,
  message: MailMessage,
): Promise<boolean> {
  if (!settings.smtpHost || !settings.smtpUser || !settings.smtpPass || !message.to) {
    // eslint-disable-next-line no-console
    console.log(`[mail] SMTP not configured; message for ${message.to || "(nobody)"}:\n${message.subject}\n${message.text}`);
    return false;
  }

  const transport = nodemailer.createTransport({
    host: settings.smtpHost,
    port: settings.smtpPort,
    secure: settings.smtpPort === 465,
    auth: { user: settings.smtpUser, pass: settings.smtpPass },
  });
  try {
    await transport.sendMail({
      from: settings.smtpUser,
      to: message.to,
      subject: message.subject,
      text: message.text,
    });
    return true;
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error("[mail] send failed", error);
    return false;
  } finally {
    transport.close();
  }
}
