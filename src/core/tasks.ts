/**
 * Task operations. Each takes a live session and runs inside its unit of
 * work; none commits on its own.
 *
 * Every read and mutation is scoped by owner: a task owned by someone else
 * is indistinguishable from a missing one.
 */
import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { SqlValue } from "../db/backend.js";
import { escapeLike } from "../db/dialect.js";
import type { Session } from "../db/session.js";
import { NotFoundError } from "./exceptions.js";
import { TASK_COLUMNS, toTask } from "./rows.js";
import type { NewTask, Task, TaskStatusFilter, TaskUpdate } from "./types.js";
import { NewTaskSchema, TaskUpdateSchema, validate } from "./validation.js";

const StatusFilterSchema = z.object({
  status: z.enum(["all", "active", "completed"], {
    errorMap: () => ({ message: "Status must be one of all, active, completed" }),
  }),
});

/** Most recent first; insertion order breaks ties so the order is total. */
const NEWEST_FIRST = "ORDER BY created_at DESC, seq DESC";

async function assertUserExists(session: Session, userId: string): Promise<void> {
  const row = await session.queryOne(`SELECT id FROM ${session.table("user")} WHERE id = ?`, [
    userId,
  ]);
  if (!row) throw new NotFoundError("User", userId);
}

export async function createTask(session: Session, ownerId: string, input: NewTask): Promise<Task> {
  const data = validate(NewTaskSchema, input);
  await assertUserExists(session, ownerId);

  const task: Task = {
    id: randomUUID(),
    userId: ownerId,
    title: data.title,
    content: data.content ?? null,
    completed: false,
    completedAt: null,
    deadline: data.deadline ?? null,
    createdAt: session.now(),
    updatedAt: null,
  };
  await session.execute(
    `INSERT INTO ${session.table("task")} (${TASK_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      task.id,
      task.userId,
      task.title,
      task.content,
      task.completed,
      task.completedAt,
      task.deadline,
      task.createdAt,
      task.updatedAt,
    ],
  );
  return task;
}

export async function getTasks(
  session: Session,
  ownerId: string,
  status: TaskStatusFilter = "all",
): Promise<Task[]> {
  validate(StatusFilterSchema, { status });
  const params: SqlValue[] = [ownerId];
  let where = "user_id = ?";
  if (status !== "all") {
    where += " AND completed = ?";
    params.push(status === "completed");
  }
  const rows = await session.query(
    `SELECT ${TASK_COLUMNS} FROM ${session.table("task")} WHERE ${where} ${NEWEST_FIRST}`,
    params,
  );
  return rows.map(toTask);
}

/**
 * One task of `ownerId`. With `forUpdate`, server backends lock the row
 * until the unit of work ends.
 */
export async function getTask(
  session: Session,
  taskId: string,
  ownerId: string,
  opts: { forUpdate?: boolean } = {},
): Promise<Task> {
  const lock = opts.forUpdate ? session.dialect.lockClause : "";
  const row = await session.queryOne(
    `SELECT ${TASK_COLUMNS} FROM ${session.table("task")} WHERE id = ? AND user_id = ?${lock}`,
    [taskId, ownerId],
  );
  if (!row) throw new NotFoundError("Task", taskId);
  return toTask(row);
}

/** Apply only the fields present in `fields`. No fields, no write. */
export async function updateTask(
  session: Session,
  taskId: string,
  ownerId: string,
  fields: TaskUpdate,
): Promise<Task> {
  const changes = validate(TaskUpdateSchema, fields);
  const current = await getTask(session, taskId, ownerId, { forUpdate: true });

  const sets: string[] = [];
  const params: SqlValue[] = [];
  const next: Task = { ...current };
  const now = session.now();

  if (changes.title !== undefined) {
    sets.push("title = ?");
    params.push(changes.title);
    next.title = changes.title;
  }
  if (changes.content !== undefined) {
    sets.push("content = ?");
    params.push(changes.content);
    next.content = changes.content;
  }
  if (changes.deadline !== undefined) {
    sets.push("deadline = ?");
    params.push(changes.deadline);
    next.deadline = changes.deadline;
  }
  if (changes.completed !== undefined && changes.completed !== current.completed) {
    next.completed = changes.completed;
    next.completedAt = changes.completed ? now : null;
    sets.push("completed = ?", "completed_at = ?");
    params.push(next.completed, next.completedAt);
  }
  if (sets.length === 0) return current;

  sets.push("updated_at = ?");
  params.push(now);
  next.updatedAt = now;

  await session.execute(
    `UPDATE ${session.table("task")} SET ${sets.join(", ")} WHERE id = ? AND user_id = ?`,
    [...params, taskId, ownerId],
  );
  return next;
}

export async function toggleTask(session: Session, taskId: string, ownerId: string): Promise<Task> {
  const current = await getTask(session, taskId, ownerId, { forUpdate: true });
  const now = session.now();
  const next: Task = {
    ...current,
    completed: !current.completed,
    completedAt: current.completed ? null : now,
    updatedAt: now,
  };
  await session.execute(
    `UPDATE ${session.table("task")} SET completed = ?, completed_at = ?, updated_at = ? WHERE id = ? AND user_id = ?`,
    [next.completed, next.completedAt, now, taskId, ownerId],
  );
  return next;
}

/**
 * Remove a task. Resolves `true` when a row went away, `false` when there
 * was nothing to remove. A task that exists under another owner is
 * reported as not found and left alone.
 */
export async function deleteTask(session: Session, taskId: string, ownerId: string): Promise<boolean> {
  const table = session.table("task");
  const removed = await session.execute(`DELETE FROM ${table} WHERE id = ? AND user_id = ?`, [
    taskId,
    ownerId,
  ]);
  if (removed > 0) return true;

  const foreign = await session.queryOne(`SELECT id FROM ${table} WHERE id = ?`, [taskId]);
  if (foreign) throw new NotFoundError("Task", taskId);
  return false;
}

/**
 * Case-insensitive substring match on title or content, newest first. Empty
 * text lists every task of the owner; whitespace is searched for like any
 * other text.
 */
export async function searchTasks(session: Session, ownerId: string, text: string): Promise<Task[]> {
  if (text === "") return getTasks(session, ownerId, "all");

  const { lower } = session.dialect;
  const pattern = `%${escapeLike(text.toLowerCase())}%`;
  const rows = await session.query(
    `SELECT ${TASK_COLUMNS} FROM ${session.table("task")}
     WHERE user_id = ?
       AND (${lower("title")} LIKE ? ESCAPE '!' OR ${lower("COALESCE(content, '')")} LIKE ? ESCAPE '!')
     ${NEWEST_FIRST}`,
    [ownerId, pattern, pattern],
  );
  return rows.map(toTask);
}
