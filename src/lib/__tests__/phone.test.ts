import { describe, expect, it } from "vitest";
import { ValidationError } from "../errors.js";
import { isPhoneNumber, parsePhoneNumber } from "../phone.js";

describe("parsePhoneNumber", () => {
  it.each(["+972 50-123-4567", "00972501234567", "(972) 50.123.4567", "972501234567"])(
    "reads %s",
    (input) => {
      expect(parsePhoneNumber(input)).toEqual({ digits: "972501234567", value: 972501234567 });
    },
  );

  it("accepts a number", () => {
    expect(parsePhoneNumber(12125550100).digits).toBe("12125550100");
  });

  it("returns a parsed value unchanged", () => {
    const parsed = parsePhoneNumber("12125550100");
    expect(parsePhoneNumber(parsed)).toBe(parsed);
  });

  it("rejects local numbers with a trunk prefix", () => {
    expect(() => parsePhoneNumber("0501234567")).toThrow(
      'Invalid phone number "0501234567". Use international format, e.g. +972501234567.',
    );
  });

  it.each(["", "12345", "+1234567890123456", "97250abc4567"])("rejects %j", (input) => {
    expect(() => parsePhoneNumber(input)).toThrow(ValidationError);
  });

  it("rejects a fractional number", () => {
    expect(() => parsePhoneNumber(1.5)).toThrow("Invalid phone number: 1.5");
  });
});

describe("isPhoneNumber", () => {
  it("answers without throwing", () => {
    expect(isPhoneNumber("+12125550100")).toBe(true);
    expect(isPhoneNumber("nope")).toBe(false);
  });
});
