/**
 * Row schemas: every driver hands back its own shapes (0/1 or booleans, ISO
 * text or Date objects). These normalise them into domain values.
 */
import { z } from "zod";
import type { Row } from "../db/backend.js";
import type { Task, User } from "./types.js";

const timestamp = z.union([z.date(), z.string(), z.number()]).pipe(z.coerce.date());

const flag = z
  .union([z.boolean(), z.number(), z.string(), z.bigint()])
  .transform((v) => (typeof v === "string" ? v === "1" || v === "t" || v === "true" : Boolean(v)));

export const TaskRowSchema = z
  .object({
    id: z.string(),
    user_id: z.string(),
    title: z.string(),
    content: z.string().nullable(),
    completed: flag,
    completed_at: timestamp.nullable(),
    deadline: timestamp.nullable(),
    created_at: timestamp,
    updated_at: timestamp.nullable(),
  })
  .transform(
    (r): Task => ({
      id: r.id,
      userId: r.user_id,
      title: r.title,
      content: r.content,
      completed: r.completed,
      completedAt: r.completed_at,
      deadline: r.deadline,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
    }),
  );

export const UserRowSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    hashed_password: z.string(),
    active: flag,
    created_at: timestamp,
    updated_at: timestamp.nullable(),
    last_login_at: timestamp.nullable(),
  })
  .transform(
    (r): User => ({
      id: r.id,
      name: r.name,
      hashedPassword: r.hashed_password,
      active: r.active,
      createdAt: r.created_at,
      updatedAt: r.updated_at,
      lastLoginAt: r.last_login_at,
    }),
  );

export const TASK_COLUMNS =
  "id, user_id, title, content, completed, completed_at, deadline, created_at, updated_at";
export const USER_COLUMNS =
  "id, name, hashed_password, active, created_at, updated_at, last_login_at";

export function toTask(row: Row): Task {
  return TaskRowSchema.parse(row);
}

export function toUser(row: Row): User {
  return UserRowSchema.parse(row);
}
