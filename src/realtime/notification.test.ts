import { describe, expect, it } from "vitest";

import { parseNotification, serializeNotification, toUpdateMessage } from "./notification.js";
import { MalformedPayloadError } from "../utils/errors.js";

const TRG_PAYLOAD = '{"ticker":"TRG","price":72.45,"updated_at":"2026-01-12T08:10:00.000Z"}';

describe("parseNotification", () => {
  it("parses a well-formed payload", () => {
    const notification = parseNotification(TRG_PAYLOAD);

    expect(notification.ticker).toBe("TRG");
    expect(notification.price).toBe(72.45);
    expect(notification.updated_at.toISOString()).toBe("2026-01-12T08:10:00.000Z");
  });

  it("accepts numeric strings for the price", () => {
    const notification = parseNotification('{"ticker":"TRG","price":"72.4500","updated_at":"2026-01-12T08:10:00Z"}');

    expect(notification.price).toBe(72.45);
  });

  it("accepts signed and exponent decimal strings", () => {
    const at = '"updated_at":"2026-01-12T08:10:00Z"';

    expect(parseNotification(`{"ticker":"TRG","price":"+72.45",${at}}`).price).toBe(72.45);
    expect(parseNotification(`{"ticker":"TRG","price":"7.245e1",${at}}`).price).toBe(72.45);
    expect(parseNotification(`{"ticker":"TRG","price":".5",${at}}`).price).toBe(0.5);
  });

  it("normalizes timestamps with an offset to UTC", () => {
    const notification = parseNotification(
      '{"ticker":"TRG","price":72.45,"updated_at":"2026-01-12T10:10:00+02:00"}'
    );

    expect(notification.updated_at.toISOString()).toBe("2026-01-12T08:10:00.000Z");
  });

  it.each([
    ["a missing payload", undefined],
    ["an empty payload", ""],
    ["invalid JSON", "{ticker: TRG}"],
    ["a JSON array", "[1,2,3]"],
    ["a missing ticker", '{"price":1,"updated_at":"2026-01-12T08:10:00Z"}'],
    ["a blank ticker", '{"ticker":"  ","price":1,"updated_at":"2026-01-12T08:10:00Z"}'],
    ["a non-numeric price", '{"ticker":"TRG","price":"n/a","updated_at":"2026-01-12T08:10:00Z"}'],
    ["a hexadecimal price", '{"ticker":"TRG","price":"0x1A","updated_at":"2026-01-12T08:10:00Z"}'],
    ["a binary price", '{"ticker":"TRG","price":"0b101","updated_at":"2026-01-12T08:10:00Z"}'],
    ["an infinite price", '{"ticker":"TRG","price":"Infinity","updated_at":"2026-01-12T08:10:00Z"}'],
    ["a null price", '{"ticker":"TRG","price":null,"updated_at":"2026-01-12T08:10:00Z"}'],
    ["an invalid timestamp", '{"ticker":"TRG","price":1,"updated_at":"yesterday"}'],
  ])("rejects %s", (_label, payload) => {
    expect(() => parseNotification(payload)).toThrow(MalformedPayloadError);
  });

  it("names the offending fields", () => {
    expect(() => parseNotification('{"ticker":"TRG","price":"n/a","updated_at":"yesterday"}')).toThrow(
      "Notification payload is invalid: price, updated_at"
    );
  });
});

describe("serializeNotification", () => {
  it("reproduces the broadcast payload shape", () => {
    expect(serializeNotification(parseNotification(TRG_PAYLOAD))).toBe(TRG_PAYLOAD);
  });

  it("maps to the update message with an ISO timestamp", () => {
    const message = toUpdateMessage({
      ticker: "ACM",
      price: 10,
      updated_at: new Date("2026-03-01T00:00:00.000Z"),
    });

    expect(message).toEqual({ ticker: "ACM", price: 10, updated_at: "2026-03-01T00:00:00.000Z" });
  });
});
