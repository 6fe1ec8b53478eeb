/**
 * Runtime preference keys
 * Toggles are stored as "true"/"false" strings; a missing key means enabled
 */

import { z } from "zod";

export const PREFERENCE_KEYS = {
  SOURCE_HN_ENABLED: "SOURCE_HN_ENABLED",
  SOURCE_REDDIT_ENABLED: "SOURCE_REDDIT_ENABLED",
  SOURCE_RSS_ENABLED: "SOURCE_RSS_ENABLED",
  PERSONA_GENAI_NEWS_ENABLED: "PERSONA_GENAI_NEWS_ENABLED",
  PERSONA_PRODUCT_IDEAS_ENABLED: "PERSONA_PRODUCT_IDEAS_ENABLED",
  PERSONA_FINANCE_ENABLED: "PERSONA_FINANCE_ENABLED",
  DELIVERY_EMAIL_ENABLED: "DELIVERY_EMAIL_ENABLED",
  DELIVERY_TELEGRAM_ENABLED: "DELIVERY_TELEGRAM_ENABLED",
} as const;

export type PreferenceKey = (typeof PREFERENCE_KEYS)[keyof typeof PREFERENCE_KEYS];

/**
 * Comma-separated extra email recipients, added to EMAIL_TO
 */
export const EMAIL_RECIPIENTS_KEY = "DELIVERY_EMAIL_CUSTOM_RECIPIENTS";

/**
 * Source family (see sourceKey) -> the preference that enables it
 */
export const SOURCE_PREFERENCE_KEYS: Readonly<Record<string, PreferenceKey>> = {
  HackerNews: PREFERENCE_KEYS.SOURCE_HN_ENABLED,
  Reddit: PREFERENCE_KEYS.SOURCE_REDDIT_ENABLED,
  RSS: PREFERENCE_KEYS.SOURCE_RSS_ENABLED,
};

export const PREFERENCE_DEFAULT = "true";

const TOGGLE_KEYS: ReadonlySet<string> = new Set(Object.values(PREFERENCE_KEYS));

const EmailSchema = z.string().email();

export function isEnabledValue(value: string): boolean {
  return value.trim().toLowerCase() === "true";
}

export function isToggleKey(key: string): key is PreferenceKey {
  return TOGGLE_KEYS.has(key);
}

/**
 * Split a stored recipient list, dropping blanks
 */
export function parseRecipientList(value: string | undefined): string[] {
  return (value ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

export function isValidEmail(value: string): boolean {
  return EmailSchema.safeParse(value).success;
}

/**
 * Validate a value before it is stored and return its canonical form.
 * Toggles accept true/false in any case; the recipient list takes
 * comma-separated addresses. Unknown keys are refused.
 */
export function parsePreferenceValue(key: string, value: string): string {
  if (isToggleKey(key)) {
    const normalized = value.trim().toLowerCase();
    if (normalized !== "true" && normalized !== "false") {
      throw new Error(`Invalid value "${value}" for ${key}: expected true or false`);
    }
    return normalized;
  }

  if (key === EMAIL_RECIPIENTS_KEY) {
    const recipients = parseRecipientList(value);
    const invalid = recipients.filter((entry) => !isValidEmail(entry));
    if (invalid.length > 0) {
      throw new Error(`Invalid email address for ${key}: ${invalid.join(", ")}`);
    }
    return recipients.join(",");
  }

  throw new Error(`Unknown preference key: ${key}`);
}
