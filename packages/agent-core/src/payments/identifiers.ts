import { randomBytes } from "node:crypto";
import { ValidationError } from "../errors.js";

export const MIN_PURCHASER_IDENTIFIER_LENGTH = 15;
export const MAX_PURCHASER_IDENTIFIER_LENGTH = 26;

export function generatePurchaserIdentifier(length = MAX_PURCHASER_IDENTIFIER_LENGTH): string {
  if (
    !Number.isInteger(length) ||
    length < MIN_PURCHASER_IDENTIFIER_LENGTH ||
    length > MAX_PURCHASER_IDENTIFIER_LENGTH
  ) {
    throw new ValidationError("Invalid purchaser identifier length", [
      `length must be an integer between ${MIN_PURCHASER_IDENTIFIER_LENGTH} and ${MAX_PURCHASER_IDENTIFIER_LENGTH}, got ${length}`
    ]);
  }
  return randomBytes(Math.ceil(length / 2)).toString("hex").slice(0, length);
}
