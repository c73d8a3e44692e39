/**
 * Seed data: a default `admin` user and two sample tasks.
 *
 * Seeding is keyed on the admin user. When it already exists nothing is
 * written, so running the seed twice never duplicates anything.
 */
import { createHash } from "node:crypto";
import type { OpenOptions } from "./index.js";
import { TaskOrbit } from "./index.js";
import { createTask } from "./core/tasks.js";
import type { Task, User } from "./core/types.js";
import { createUser, getUserByName } from "./core/users.js";

export const DEFAULT_USER = "admin";

/** Sample tasks, oldest first. */
export const SAMPLE_TASKS = [
  { title: "Develop WebApp", content: "Setup basic web server structure" },
  { title: "Develop Frontend", content: "Server-rendered templates or a client app?" },
] as const;

/**
 * Clients send the SHA-256 hex digest of the password; the default account
 * stores the digest of its own name.
 */
export function defaultPasswordHash(): string {
  return createHash("sha256").update(DEFAULT_USER, "utf8").digest("hex");
}

export interface SeedResult {
  created: boolean;
  user: User;
  tasks: Task[];
}

/** Insert the defaults unless the admin user is already there. */
export async function seed(orbit: TaskOrbit): Promise<SeedResult> {
  return orbit.withSession("seed", async (session) => {
    const existing = await getUserByName(session, DEFAULT_USER);
    if (existing) return { created: false, user: existing, tasks: [] };

    const user = await createUser(session, {
      name: DEFAULT_USER,
      hashedPassword: defaultPasswordHash(),
    });
    const tasks: Task[] = [];
    for (const sample of SAMPLE_TASKS) {
      tasks.push(await createTask(session, user.id, sample));
    }
    return { created: true, user, tasks };
  });
}

/** One-shot: open from a configuration, prepare the schema, seed, close. */
export async function seedDatabase(options: OpenOptions): Promise<SeedResult> {
  const orbit = await TaskOrbit.open(options);
  try {
    return await seed(orbit);
  } finally {
    await orbit.close();
  }
}
