/**
 * Email delivery over SMTP (nodemailer)
 *
 * Recipients are EMAIL_TO plus the custom list kept in the
 * DELIVERY_EMAIL_CUSTOM_RECIPIENTS preference, resolved at send time.
 */

import nodemailer from "nodemailer";
import { logger } from "../logger";
import type { Settings } from "../../config/settings";
import {
  EMAIL_RECIPIENTS_KEY,
  PREFERENCE_KEYS,
  isValidEmail,
  parseRecipientList,
} from "../../config/preferences";
import type { PipelineStore } from "../pipeline/store";
import type { DeliveryChannel } from "./types";

export interface MailMessage {
  from: string;
  to: string[];
  subject: string;
  text: string;
}

export interface MailTransport {
  sendMail(message: MailMessage): Promise<unknown>;
}

export type RecipientResolver = () => Promise<string[]>;

export interface EmailOptions {
  enabled: boolean;
  from?: string;
  transport?: MailTransport;
  recipients: RecipientResolver;
}

export class EmailChannel implements DeliveryChannel {
  readonly name = "email";
  readonly preferenceKey = PREFERENCE_KEYS.DELIVERY_EMAIL_ENABLED;
  readonly enabled: boolean;

  constructor(private readonly options: EmailOptions) {
    this.enabled = options.enabled && Boolean(options.from && options.transport);
    if (options.enabled && !this.enabled) {
      logger.warn("Email delivery enabled but EMAIL_FROM or EMAIL_PASSWORD is missing");
    }
  }

  async send(subject: string, content: string): Promise<void> {
    const { from, transport } = this.options;
    if (!from || !transport) {
      throw new Error("Email is not configured");
    }

    const to = await this.options.recipients();
    if (to.length === 0) {
      throw new Error("No email recipients configured");
    }

    await transport.sendMail({ from, to, subject, text: content });
    logger.info(`Email digest sent to ${to.length} recipient(s)`);
  }
}

export async function getCustomRecipients(store: PipelineStore): Promise<string[]> {
  return parseRecipientList(await store.getPreference(EMAIL_RECIPIENTS_KEY, ""));
}

/**
 * Add an address to the custom list. Resolves false when it is already there.
 */
export async function addCustomRecipient(store: PipelineStore, email: string): Promise<boolean> {
  const address = email.trim();
  if (!isValidEmail(address)) {
    throw new Error(`Invalid email address: ${email}`);
  }

  const current = await getCustomRecipients(store);
  if (current.includes(address)) {
    return false;
  }
  await store.setPreference(EMAIL_RECIPIENTS_KEY, [...current, address].join(","));
  return true;
}

/**
 * Remove an address from the custom list. Resolves false when it was not there.
 */
export async function removeCustomRecipient(store: PipelineStore, email: string): Promise<boolean> {
  const address = email.trim();
  const current = await getCustomRecipients(store);
  if (!current.includes(address)) {
    return false;
  }
  await store.setPreference(EMAIL_RECIPIENTS_KEY, current.filter((entry) => entry !== address).join(","));
  return true;
}

/**
 * EMAIL_TO first, then custom recipients; duplicates dropped case-insensitively
 */
export async function resolveRecipients(store: PipelineStore, emailTo: string | undefined): Promise<string[]> {
  const seen = new Set<string>();
  const recipients: string[] = [];
  for (const address of [...parseRecipientList(emailTo), ...(await getCustomRecipients(store))]) {
    const folded = address.toLowerCase();
    if (!seen.has(folded)) {
      seen.add(folded);
      recipients.push(address);
    }
  }
  return recipients;
}

export function createSmtpTransport(settings: Settings): MailTransport | undefined {
  if (!settings.EMAIL_FROM || !settings.EMAIL_PASSWORD) {
    return undefined;
  }
  return nodemailer.createTransport({
    host: settings.EMAIL_SMTP_HOST,
    port: settings.EMAIL_SMTP_PORT,
    secure: settings.EMAIL_SMTP_PORT === 465,
    auth: { user: settings.EMAIL_FROM, pass: settings.EMAIL_PASSWORD },
    connectionTimeout: settings.EMAIL_TIMEOUT_MS,
    greetingTimeout: settings.EMAIL_TIMEOUT_MS,
    socketTimeout: settings.EMAIL_TIMEOUT_MS,
  });
}

export function createEmailChannel(
  settings: Settings,
  store: PipelineStore,
  transport: MailTransport | undefined = createSmtpTransport(settings)
): EmailChannel {
  return new EmailChannel({
    enabled: settings.EMAIL_ENABLED,
    from: settings.EMAIL_FROM,
    transport,
    recipients: () => resolveRecipients(store, settings.EMAIL_TO),
  });
}
