#!/usr/bin/env node
/**
 * CLI entrypoint for taskorbit.
 *
 * Usage:
 *   taskorbit --config taskorbit.json --init-db
 *   DB_PASS=secret taskorbit --config taskorbit.json --seed
 */
import { parseArgs } from "node:util";
import { TaskOrbit, toClientFailure, TaskOrbitError } from "./index.js";
import { seed } from "./seed.js";

const USAGE = `
taskorbit: task tracker database setup

Usage:
  taskorbit --config <file.json> --init-db
  taskorbit --config <file.json> --seed

Options:
  --config <file>   JSON configuration document (DB_* variables override it)
  --init-db         Create the schema and tables, then exit
  --seed            Create the schema and tables, then add the default
                    user and sample tasks unless already present
  --help            Show this help
`.trim();

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    config: { type: "string" },
    "init-db": { type: "boolean", default: false },
    seed: { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

if (!values["init-db"] && !values.seed) {
  console.error(USAGE);
  process.exit(1);
}

try {
  const orbit = await TaskOrbit.open({ path: values.config });
  try {
    const { schema } = orbit;
    console.log(
      `Schema ${schema.schema ?? "(file)"}: created [${schema.created.join(", ")}], present [${schema.existing.join(", ")}]`,
    );
    if (values.seed) {
      const result = await seed(orbit);
      console.log(
        result.created
          ? `Seeded user "${result.user.name}" with ${result.tasks.length} tasks`
          : `User "${result.user.name}" already exists; nothing seeded`,
      );
    }
  } finally {
    await orbit.close();
  }
} catch (err) {
  const message = err instanceof TaskOrbitError ? err.message : toClientFailure(err).message;
  console.error(`taskorbit: ${message}`);
  process.exit(1);
}
