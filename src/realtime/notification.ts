/**
 * Upstream payload parsing and the broadcast wire format.
 */

import { z } from "zod";
import { MalformedPayloadError } from "../utils/errors.js";
import type { PriceNotification, PriceUpdateMessage } from "../types/prices.js";

// numeric columns arrive as JSON numbers from json_build_object, but as
// strings when the producer casts them to text; accept both. Strings must be
// plain decimals: Number() would also take "0x1A" or "Infinity".
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const priceSchema = z
  .union([z.number(), z.string().trim().regex(DECIMAL)])
  .transform((value) => Number(value))
  .pipe(z.number().finite());

const timestampSchema = z.string().transform((value, ctx) => {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "invalid timestamp" });
    return z.NEVER;
  }
  return date;
});

const payloadSchema = z.object({
  ticker: z.string().trim().min(1),
  price: priceSchema,
  updated_at: timestampSchema,
});

/**
 * Parse one notification payload.
 *
 * @throws MalformedPayloadError when the payload is missing, is not JSON, or
 * does not carry a ticker, a finite price and a valid timestamp.
 */
export function parseNotification(payload: string | undefined): PriceNotification {
  if (payload === undefined || payload === "") {
    throw new MalformedPayloadError("Notification has no payload", "");
  }

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    throw new MalformedPayloadError("Notification payload is not valid JSON", payload);
  }

  const result = payloadSchema.safeParse(json);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join(".") || "(root)");
    throw new MalformedPayloadError(`Notification payload is invalid: ${fields.join(", ")}`, payload);
  }
  return result.data;
}

export function toUpdateMessage(notification: PriceNotification): PriceUpdateMessage {
  return {
    ticker: notification.ticker,
    price: notification.price,
    updated_at: notification.updated_at.toISOString(),
  };
}

/**
 * Serialize once per broadcast; every session gets the same string.
 */
export function serializeNotification(notification: PriceNotification): string {
  return JSON.stringify(toUpdateMessage(notification));
}
