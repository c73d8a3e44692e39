/**
 * taskorbit: persistence core of a small task tracker.
 *
 * `TaskOrbit.open()` resolves the configuration, connects, prepares the
 * schema and hands back an object whose methods each run as one unit of
 * work. The plain operations in `core/tasks` and `core/users` are exported
 * too, for callers that compose several of them inside `withSession`.
 */
import { loadConfig, type DbConfig } from "./config.js";
import type {
  NewTask,
  NewUser,
  Task,
  TaskStatusFilter,
  TaskUpdate,
  User,
} from "./core/types.js";
import * as tasks from "./core/tasks.js";
import * as users from "./core/users.js";
import type { DatabaseBackend } from "./db/backend.js";
import { openBackend } from "./db/factory.js";
import type { PoolOptions } from "./db/pool.js";
import { ensureSchema, type SchemaReport } from "./db/schema.js";
import { SessionManager, type Session } from "./db/session.js";
import { componentLogger, getLogger, type Logger } from "./logger.js";

export * from "./config.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export { createTask, getTask, getTasks, updateTask, toggleTask, deleteTask, searchTasks } from "./core/tasks.js";
export { createUser, getUserByName, getUserById, recordLogin, setUserActive } from "./core/users.js";
export type { Session } from "./db/session.js";
export { createLogger, type Logger } from "./logger.js";

export interface OpenOptions {
  /** JSON configuration document. */
  path?: string;
  /** In-memory configuration; wins over the file. */
  config?: Record<string, unknown>;
  /** Defaults to `process.env`; pass `{}` to ignore the environment. */
  env?: Record<string, string | undefined>;
  logger?: Logger;
  pool?: Partial<PoolOptions>;
  clock?: () => Date;
}

export class TaskOrbit {
  readonly config: DbConfig;
  readonly schema: SchemaReport;
  private backend: DatabaseBackend;
  private sessions: SessionManager;
  private log: Logger;

  private constructor(
    config: DbConfig,
    backend: DatabaseBackend,
    schema: SchemaReport,
    sessions: SessionManager,
    log: Logger,
  ) {
    this.config = config;
    this.backend = backend;
    this.schema = schema;
    this.sessions = sessions;
    this.log = log;
  }

  /** Configure, connect and prepare the schema. Any failure is fatal. */
  static async open(options: OpenOptions): Promise<TaskOrbit> {
    const root = options.logger ?? getLogger();
    const log = componentLogger("taskorbit", root);
    const { config, ignored } = loadConfig({
      path: options.path,
      raw: options.config,
      env: options.env ?? process.env,
    });
    if (ignored.length > 0) {
      log.warn({ keys: ignored }, "ignoring unknown configuration keys");
    }

    const backend = await openBackend(config, componentLogger("backend", root));
    try {
      const schema = await ensureSchema(backend, config, componentLogger("schema", root));
      const sessions = new SessionManager(backend, {
        tables: schema.tables,
        logger: componentLogger("session", root),
        echo: config.echo,
        pool: options.pool,
        clock: options.clock,
      });
      return new TaskOrbit(config, backend, schema, sessions, log);
    } catch (err) {
      await backend.close().catch((closeErr: unknown) => {
        log.warn({ err: closeErr }, "closing backend after failed setup failed");
      });
      throw err;
    }
  }

  /** Run several operations as one unit of work. */
  async withSession<T>(operation: string, fn: (session: Session) => Promise<T>): Promise<T> {
    return this.sessions.run(operation, fn);
  }

  // ------------------------------------------------------------------
  // Tasks
  // ------------------------------------------------------------------

  async createTask(ownerId: string, input: NewTask): Promise<Task> {
    return this.sessions.run("create_task", (s) => tasks.createTask(s, ownerId, input));
  }

  async getTasks(ownerId: string, status: TaskStatusFilter = "all"): Promise<Task[]> {
    return this.sessions.run("get_tasks", (s) => tasks.getTasks(s, ownerId, status));
  }

  async getTask(taskId: string, ownerId: string): Promise<Task> {
    return this.sessions.run("get_task", (s) => tasks.getTask(s, taskId, ownerId));
  }

  async updateTask(taskId: string, ownerId: string, fields: TaskUpdate): Promise<Task> {
    return this.sessions.run("update_task", (s) => tasks.updateTask(s, taskId, ownerId, fields));
  }

  async toggleTask(taskId: string, ownerId: string): Promise<Task> {
    return this.sessions.run("toggle_task", (s) => tasks.toggleTask(s, taskId, ownerId));
  }

  async deleteTask(taskId: string, ownerId: string): Promise<boolean> {
    return this.sessions.run("delete_task", (s) => tasks.deleteTask(s, taskId, ownerId));
  }

  async searchTasks(ownerId: string, text: string): Promise<Task[]> {
    return this.sessions.run("search_tasks", (s) => tasks.searchTasks(s, ownerId, text));
  }

  // ------------------------------------------------------------------
  // Users
  // ------------------------------------------------------------------

  async createUser(input: NewUser): Promise<User> {
    return this.sessions.run("create_user", (s) => users.createUser(s, input));
  }

  async getUserByName(name: string): Promise<User | null> {
    return this.sessions.run("get_user_by_name", (s) => users.getUserByName(s, name));
  }

  async getUserById(id: string): Promise<User | null> {
    return this.sessions.run("get_user_by_id", (s) => users.getUserById(s, id));
  }

  async recordLogin(id: string): Promise<User> {
    return this.sessions.run("record_login", (s) => users.recordLogin(s, id));
  }

  async setUserActive(id: string, active: boolean): Promise<User> {
    return this.sessions.run("set_user_active", (s) => users.setUserActive(s, id, active));
  }

  /** Close the connection pool. */
  async close(): Promise<void> {
    await this.backend.close();
    this.log.info({ backend: this.config.type }, "database closed");
  }
}
