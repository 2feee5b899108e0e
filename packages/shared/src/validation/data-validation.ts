import type { StringValidationOptions } from "../types.ts";

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function validateString(
  value: unknown,
  options: StringValidationOptions = {},
): { valid: boolean; error?: string } {
  const label = options.label ?? "String";

  if (typeof value !== "string") {
    return { valid: false, error: `${label} is not a string` };
  }

  let str = value;

  if (options.trim) {
    str = str.trim();
  }

  if (!str && !options.allowEmpty) {
    return { valid: false, error: `${label} cannot be empty` };
  }

  if (options.minLength && str.length < options.minLength) {
    return {
      valid: false,
      error: `${label} must be at least ${options.minLength} characters`,
    };
  }

  if (options.maxLength && str.length > options.maxLength) {
    return {
      valid: false,
      error: `${label} must be ${options.maxLength.toLocaleString("en-US")} characters or less`,
    };
  }

  return { valid: true };
}

export function isValidEmail(email: string): boolean {
  if (!email || typeof email !== "string") return false;
  return EMAIL_PATTERN.test(email.trim().toLowerCase());
}

export function validateEmail(
  email: string,
): { valid: boolean; error?: string } {
  if (!email) {
    return { valid: false, error: "Email is required" };
  }

  if (!isValidEmail(email)) {
    return { valid: false, error: "Invalid email address" };
  }

  return { valid: true };
}
