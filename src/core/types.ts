/**
 * Domain types shared by the persistence core and its callers.
 */

export type BackendKind = "sqlite" | "postgresql" | "mysql";

export type TaskStatusFilter = "all" | "active" | "completed";

export interface User {
  id: string;
  name: string;
  hashedPassword: string;
  active: boolean;
  createdAt: Date;
  updatedAt: Date | null;
  lastLoginAt: Date | null;
}

export interface Task {
  id: string;
  userId: string;
  title: string;
  content: string | null;
  completed: boolean;
  completedAt: Date | null;
  deadline: Date | null;
  createdAt: Date;
  updatedAt: Date | null;
}

export interface NewTask {
  title: string;
  content?: string | null;
  deadline?: Date | null;
}

/** Fields of a task that `updateTask` may change; absent keys stay as they are. */
export interface TaskUpdate {
  title?: string;
  content?: string | null;
  completed?: boolean;
  deadline?: Date | null;
}

export interface NewUser {
  name: string;
  hashedPassword: string;
}

/** Physical table names, fixed for the lifetime of the process. */
export interface TableNames {
  user: string;
  task: string;
}
