import { z } from "zod";
import type {
  AccessTokenResponse,
  EventRecord,
  UserRecord,
} from "../types.ts";

export type SchemaParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

// ids come back as integers, though some deployments serialize them as strings
const idSchema = z.union([
  z.number().int(),
  z.string().regex(/^-?\d+$/).transform(Number),
]);

const nullableText = z.string().nullish().transform((value) => value ?? null);

const tagsSchema = z
  .union([z.string(), z.array(z.string())])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return "";
    return typeof value === "string" ? value : value.join(",");
  });

export const eventRecordSchema: z.ZodType<EventRecord, z.ZodTypeDef, unknown> =
  z.object({
    id: idSchema,
    name: z.string(),
    location: z.string(),
    starts_at: z.string(),
    ends_at: nullableText,
    host: nullableText,
    description: nullableText,
    tags: tagsSchema,
    created_at: nullableText,
    owner_id: idSchema.nullish().transform((value) => value ?? null),
  });

export const eventRecordListSchema = z.array(eventRecordSchema);

export const accessTokenSchema: z.ZodType<
  AccessTokenResponse,
  z.ZodTypeDef,
  unknown
> = z.object({
  access_token: z.string().min(1),
  token_type: z.string().default("bearer"),
});

export const userRecordSchema: z.ZodType<UserRecord, z.ZodTypeDef, unknown> =
  z.object({
    id: idSchema,
    email: z.string(),
    name: z.string(),
    created_at: z.string(),
    is_host: z.boolean().nullish().transform((value) => value ?? null),
  });

/** FastAPI-style error body: `{ "detail": "..." }` */
export const errorDetailSchema = z.object({
  detail: z.union([
    z.string(),
    z.array(z.object({ msg: z.string() }).passthrough()),
  ]),
});

export function formatSchemaIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseWithSchema<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
): SchemaParseResult<T> {
  const result = schema.safeParse(payload);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: formatSchemaIssues(result.error) };
}

/**
 * Pull a readable message out of an API error body, if it has one.
 */
export function extractErrorDetail(payload: unknown): string | null {
  const result = errorDetailSchema.safeParse(payload);
  if (!result.success) return null;

  const { detail } = result.data;
  if (typeof detail === "string") return detail;
  return detail.map((item) => item.msg).join("; ") || null;
}
