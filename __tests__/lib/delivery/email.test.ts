/**
 * Tests for email delivery and the custom recipient list
 */

import { describe, it, expect, beforeEach, vi } from "vitest";

const { createTransport } = vi.hoisted(() => ({
  createTransport: vi.fn(),
}));

vi.mock("nodemailer", () => ({
  default: { createTransport },
}));

import {
  EmailChannel,
  addCustomRecipient,
  createEmailChannel,
  createSmtpTransport,
  getCustomRecipients,
  removeCustomRecipient,
  resolveRecipients,
  type MailMessage,
  type MailTransport,
} from "../../../src/lib/delivery/email";
import { loadSettings } from "../../../src/config/settings";
import { MemoryStore } from "../../helpers/fakes";

class RecordingTransport implements MailTransport {
  sent: MailMessage[] = [];

  async sendMail(message: MailMessage): Promise<unknown> {
    this.sent.push(message);
    return { messageId: "test-message" };
  }
}

describe("custom recipients", () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  it("adds an address once", async () => {
    expect(await addCustomRecipient(store, "a@example.com")).toBe(true);
    expect(await addCustomRecipient(store, " a@example.com ")).toBe(false);
    expect(await addCustomRecipient(store, "b@example.com")).toBe(true);

    expect(store.preferences.get("DELIVERY_EMAIL_CUSTOM_RECIPIENTS")).toBe("a@example.com,b@example.com");
    expect(await getCustomRecipients(store)).toEqual(["a@example.com", "b@example.com"]);
  });

  it("rejects an invalid address", async () => {
    await expect(addCustomRecipient(store, "nobody")).rejects.toThrow("Invalid email address: nobody");
    expect(store.preferences.size).toBe(0);
  });

  it("removes an address", async () => {
    await store.setPreference("DELIVERY_EMAIL_CUSTOM_RECIPIENTS", "a@example.com,b@example.com");

    expect(await removeCustomRecipient(store, "a@example.com")).toBe(true);
    expect(await removeCustomRecipient(store, "a@example.com")).toBe(false);
    expect(store.preferences.get("DELIVERY_EMAIL_CUSTOM_RECIPIENTS")).toBe("b@example.com");
  });

  it("puts EMAIL_TO first and drops duplicates", async () => {
    await store.setPreference("DELIVERY_EMAIL_CUSTOM_RECIPIENTS", "Owner@example.com,c@example.com");

    expect(await resolveRecipients(store, "owner@example.com, d@example.com")).toEqual([
      "owner@example.com",
      "d@example.com",
      "c@example.com",
    ]);
    expect(await resolveRecipients(new MemoryStore(), undefined)).toEqual([]);
  });
});

describe("EmailChannel", () => {
  it("is disabled without a sender or transport", () => {
    const recipients = async () => ["a@example.com"];
    expect(new EmailChannel({ enabled: true, recipients, transport: new RecordingTransport() }).enabled).toBe(false);
    expect(new EmailChannel({ enabled: true, recipients, from: "digest@example.com" }).enabled).toBe(false);
    expect(
      new EmailChannel({ enabled: false, recipients, from: "digest@example.com", transport: new RecordingTransport() })
        .enabled
    ).toBe(false);
  });

  it("sends the digest to every resolved recipient", async () => {
    const transport = new RecordingTransport();
    const channel = new EmailChannel({
      enabled: true,
      from: "digest@example.com",
      transport,
      recipients: async () => ["a@example.com", "b@example.com"],
    });

    await channel.send("AI Intelligence Digest - 2026-10-19", "# Digest");

    expect(channel.name).toBe("email");
    expect(channel.preferenceKey).toBe("DELIVERY_EMAIL_ENABLED");
    expect(transport.sent).toEqual([
      {
        from: "digest@example.com",
        to: ["a@example.com", "b@example.com"],
        subject: "AI Intelligence Digest - 2026-10-19",
        text: "# Digest",
      },
    ]);
  });

  it("fails when nobody is on the list", async () => {
    const channel = new EmailChannel({
      enabled: true,
      from: "digest@example.com",
      transport: new RecordingTransport(),
      recipients: async () => [],
    });

    await expect(channel.send("Digest", "body")).rejects.toThrow("No email recipients configured");
  });
});

describe("createEmailChannel", () => {
  beforeEach(() => {
    createTransport.mockReset();
  });

  it("builds an SMTP transport from settings", () => {
    const transport = new RecordingTransport();
    createTransport.mockReturnValue(transport);
    const settings = loadSettings({
      EMAIL_FROM: "digest@example.com",
      EMAIL_PASSWORD: "test-secret",
      EMAIL_TIMEOUT_MS: "5000",
    });

    expect(createSmtpTransport(settings)).toBe(transport);
    expect(createTransport).toHaveBeenCalledWith({
      host: "smtp.gmail.com",
      port: 465,
      secure: true,
      auth: { user: "digest@example.com", pass: "test-secret" },
      connectionTimeout: 5000,
      greetingTimeout: 5000,
      socketTimeout: 5000,
    });
  });

  it("skips the transport without credentials", () => {
    expect(createSmtpTransport(loadSettings({ EMAIL_FROM: "digest@example.com" }))).toBeUndefined();
    expect(createTransport).not.toHaveBeenCalled();
  });

  it("resolves recipients from settings and the store at send time", async () => {
    const store = new MemoryStore();
    const transport = new RecordingTransport();
    const channel = createEmailChannel(
      loadSettings({ EMAIL_ENABLED: "true", EMAIL_FROM: "digest@example.com", EMAIL_TO: "owner@example.com" }),
      store,
      transport
    );
    await store.setPreference("DELIVERY_EMAIL_CUSTOM_RECIPIENTS", "friend@example.com");

    expect(channel.enabled).toBe(true);
    await channel.send("Digest", "body");

    expect(transport.sent[0].to).toEqual(["owner@example.com", "friend@example.com"]);
  });
});
