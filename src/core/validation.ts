/**
 * Input schemas for the CRUD operations.
 */
import { z } from "zod";
import { ValidationError } from "./exceptions.js";

export const MAX_TITLE = 255;
export const MAX_CONTENT = 10_000;

const title = z
  .string({ required_error: "Title is required", invalid_type_error: "Title must be text" })
  .refine((v) => v.trim().length > 0, "Title must not be empty")
  .refine((v) => v.length <= MAX_TITLE, `Title must be at most ${MAX_TITLE} characters`);

const content = z
  .string({ invalid_type_error: "Content must be text" })
  .max(MAX_CONTENT, `Content must be at most ${MAX_CONTENT} characters`)
  .nullable();

const deadline = z.date({ invalid_type_error: "Deadline must be a date" }).nullable();

export const NewTaskSchema = z.object({
  title,
  content: content.optional(),
  deadline: deadline.optional(),
});

export const TaskUpdateSchema = z.object({
  title: title.optional(),
  content: content.optional(),
  completed: z.boolean({ invalid_type_error: "Completed must be a boolean" }).optional(),
  deadline: deadline.optional(),
});

export const NewUserSchema = z.object({
  name: z
    .string({ required_error: "Name is required" })
    .refine((v) => v.trim().length > 0, "Name must not be empty")
    .refine((v) => v.length <= 255, "Name must be at most 255 characters"),
  hashedPassword: z
    .string({ required_error: "Password hash is required" })
    .min(1, "Password hash must not be empty"),
});

/** Parse `input` or throw `ValidationError` for its first bad field. */
export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const issue = parsed.error.issues[0];
  if (!issue) throw new ValidationError("input", "Invalid input");
  const field = issue.path.length > 0 ? issue.path.join(".") : "input";
  throw new ValidationError(field, issue.message);
}
