export {
  accessTokenSchema,
  eventRecordListSchema,
  eventRecordSchema,
  extractErrorDetail,
  formatSchemaIssues,
  parseWithSchema,
  userRecordSchema,
} from "./api-response-validation.ts";
export type { SchemaParseResult } from "./api-response-validation.ts";
export {
  AUTH_VALIDATION_MESSAGES,
  createBearerHeader,
  validateLoginForm,
  validateRegistrationForm,
} from "./auth-validation.ts";
export { isValidEmail, validateEmail, validateString } from "./data-validation.ts";
export {
  EVENT_VALIDATION_MESSAGES,
  validateEventDraft,
} from "./event-validation.ts";
