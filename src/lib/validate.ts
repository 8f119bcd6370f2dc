import { z, ZodError } from "zod";

export const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "must be a YYYY-MM-DD date");

export const hhmmString = z.string().regex(/^([01]\d|2[0-3]):([0-5]\d)$/, "must be a HH:mm time");

export const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length === 0 ? undefined : value))
  .optional();

export function parseOrThrow<TSchema extends z.ZodType>(schema: TSchema, input: unknown): z.output<TSchema> {
  return schema.parse(input);
}

export function zodErrorToMessage(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
