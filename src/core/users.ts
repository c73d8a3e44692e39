/**
 * User operations used by the authentication layer. Hashing happens there;
 * this module stores whatever hash it is given.
 */
import { randomUUID } from "node:crypto";
import type { Session } from "../db/session.js";
import { NotFoundError, ValidationError } from "./exceptions.js";
import { USER_COLUMNS, toUser } from "./rows.js";
import type { NewUser, User } from "./types.js";
import { NewUserSchema, validate } from "./validation.js";

function taken(name: string): ValidationError {
  return new ValidationError("name", `User name ${name} is already taken`);
}

export async function createUser(session: Session, input: NewUser): Promise<User> {
  const data = validate(NewUserSchema, input);
  if (await getUserByName(session, data.name)) {
    throw taken(data.name);
  }

  const user: User = {
    id: randomUUID(),
    name: data.name,
    hashedPassword: data.hashedPassword,
    active: true,
    createdAt: session.now(),
    updatedAt: null,
    lastLoginAt: null,
  };
  try {
    await session.execute(
      `INSERT INTO ${session.table("user")} (${USER_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?)`,
      [
        user.id,
        user.name,
        user.hashedPassword,
        user.active,
        user.createdAt,
        user.updatedAt,
        user.lastLoginAt,
      ],
    );
  } catch (err) {
    // A concurrent registration took the name between the check and the insert.
    if (session.dialect.isUniqueViolation(err)) throw taken(data.name);
    throw err;
  }
  return user;
}

export async function getUserByName(session: Session, name: string): Promise<User | null> {
  const row = await session.queryOne(
    `SELECT ${USER_COLUMNS} FROM ${session.table("user")} WHERE name = ?`,
    [name],
  );
  return row ? toUser(row) : null;
}

export async function getUserById(session: Session, id: string): Promise<User | null> {
  const row = await session.queryOne(
    `SELECT ${USER_COLUMNS} FROM ${session.table("user")} WHERE id = ?`,
    [id],
  );
  return row ? toUser(row) : null;
}

async function updateUser(
  session: Session,
  id: string,
  assignments: string,
  params: Array<boolean | Date>,
): Promise<User> {
  const table = session.table("user");
  const current = await session.queryOne(
    `SELECT ${USER_COLUMNS} FROM ${table} WHERE id = ?${session.dialect.lockClause}`,
    [id],
  );
  if (!current) throw new NotFoundError("User", id);
  await session.execute(`UPDATE ${table} SET ${assignments} WHERE id = ?`, [...params, id]);
  const updated = await getUserById(session, id);
  if (!updated) throw new NotFoundError("User", id);
  return updated;
}

/** Stamp a successful login. */
export async function recordLogin(session: Session, id: string): Promise<User> {
  return updateUser(session, id, "last_login_at = ?", [session.now()]);
}

/** Soft-disable or re-enable an account; users are never hard-deleted here. */
export async function setUserActive(session: Session, id: string, active: boolean): Promise<User> {
  const now = session.now();
  return updateUser(session, id, "active = ?, updated_at = ?", [active, now]);
}
