import { AUTH_FIELD_LIMITS } from "../config/validation-config.ts";
import type {
  LoginCredentials,
  Registration,
  ValidationResult,
} from "../types.ts";
import { isValidEmail, validateString } from "./data-validation.ts";

export const AUTH_VALIDATION_MESSAGES = {
  EMAIL_INVALID: "Please enter a valid email address",
  PASSWORD_REQUIRED: "Please enter your password",
  NAME_REQUIRED: "Please enter your name",
  PASSWORDS_DO_NOT_MATCH: "Passwords do not match",
} as const;

const BEARER_PREFIX = "Bearer ";

export function validateLoginForm(
  credentials: LoginCredentials,
): ValidationResult {
  const errors: string[] = [];

  if (!isValidEmail(credentials.email)) {
    errors.push(AUTH_VALIDATION_MESSAGES.EMAIL_INVALID);
  }

  if (!credentials.password) {
    errors.push(AUTH_VALIDATION_MESSAGES.PASSWORD_REQUIRED);
  }

  return { valid: errors.length === 0, errors };
}

export function validateRegistrationForm(
  registration: Registration,
  confirmPassword: string,
): ValidationResult {
  const errors: string[] = [];

  if (!registration.name.trim()) {
    errors.push(AUTH_VALIDATION_MESSAGES.NAME_REQUIRED);
  } else {
    const name = validateString(registration.name, {
      label: "Name",
      maxLength: AUTH_FIELD_LIMITS.NAME_MAX_LENGTH,
      trim: true,
    });
    if (name.error) errors.push(name.error);
  }

  if (!isValidEmail(registration.email)) {
    errors.push(AUTH_VALIDATION_MESSAGES.EMAIL_INVALID);
  }

  const password = validateString(registration.password, {
    label: "Password",
    minLength: AUTH_FIELD_LIMITS.PASSWORD_MIN_LENGTH,
  });
  if (password.error) errors.push(password.error);

  if (registration.password !== confirmPassword) {
    errors.push(AUTH_VALIDATION_MESSAGES.PASSWORDS_DO_NOT_MATCH);
  }

  return { valid: errors.length === 0, errors };
}

export function createBearerHeader(token: string): string {
  return `${BEARER_PREFIX}${token}`;
}
