#!/usr/bin/env node

declare const __VERSION__: string;

import chalk from "chalk";
import * as path from "node:path";
import { createConsoleLogger, resolveLogLevel } from "./console-logger.js";
import { DEFAULT_TOPOLOGY_FILE, buildTopology, loadTopology } from "./topology.js";
import { exitCodeOf } from "./host/shell.js";

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function printHelp(): void {
  console.log(`
${chalk.bold("gangway")} - Run local apps behind an embedded reverse proxy.

${chalk.bold("Usage:")}
  ${chalk.cyan("gangway run [file]")}            Start the apps and proxy described in file
  ${chalk.cyan("gangway run [file] --publish")}  Print the deployment manifest as JSON
  ${chalk.cyan("gangway --help")}                Show this help
  ${chalk.cyan("gangway --version")}             Show the version

${chalk.bold("Examples:")}
  gangway run                    # reads ./${DEFAULT_TOPOLOGY_FILE}
  gangway run ./dev/gangway.json

${chalk.bold("Topology file:")}
  {
    "apps": { "api": { "command": "npm", "args": ["run", "dev"], "cwd": "api" } },
    "proxy": {
      "name": "gateway",
      "endpoints": [{ "scheme": "http", "port": 8080 }],
      "routes": [{ "id": "api", "target": "api", "path": "/api" }]
    }
  }

  Each app gets an http endpoint passed to it as ${chalk.cyan("PORT")}.
  A route with ${chalk.cyan('"path": "*"')} matches every path.

${chalk.bold("Environment variables:")}
  GANGWAY_LOG_LEVEL=<level>  trace, debug, info, warn, error, fatal or silent (default: info)
`);
}

async function run(args: string[]): Promise<void> {
  let file: string | undefined;
  let publish = false;
  for (const arg of args) {
    if (arg === "--publish") {
      publish = true;
    } else if (arg.startsWith("-")) {
      console.error(chalk.red(`Error: Unknown option "${arg}".`));
      console.error(chalk.blue("Usage:"));
      console.error(chalk.cyan("  gangway run [file] [--publish]"));
      process.exit(1);
    } else if (file === undefined) {
      file = arg;
    } else {
      console.error(chalk.red(`Error: Unexpected argument "${arg}".`));
      process.exit(1);
    }
  }

  const filePath = path.resolve(file ?? DEFAULT_TOPOLOGY_FILE);
  const topology = loadTopology(filePath);
  const logger = createConsoleLogger(resolveLogLevel(process.env.GANGWAY_LOG_LEVEL));
  const { builder, proxy } = buildTopology(topology, {
    operation: publish ? "publish" : "run",
    contentRoot: path.dirname(filePath),
    logger,
  });
  const app = builder.build();

  if (publish) {
    await app.start();
    const manifest = await app.publish();
    await app.stop();
    console.log(JSON.stringify(manifest, null, 2));
    return;
  }

  if (proxy) {
    const resource = proxy.resource;
    app.notifications.subscribe(({ resource: updated, snapshot }) => {
      if (updated !== resource || snapshot.state !== "Running") return;
      console.log(chalk.green(`\n${resource.name} is listening on:`));
      for (const { url } of snapshot.urls) {
        console.log(chalk.cyan(`  ${url}`));
      }
      console.log(chalk.gray("\nPress Ctrl+C to stop.\n"));
    });
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      process.exit(exitCodeOf(null, signal));
    }
    console.log(chalk.gray("\nStopping..."));
    controller.abort();
  };
  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  await app.run(controller.signal);
  process.exit(0);
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === "--help" || args[0] === "-h") {
    printHelp();
    return;
  }

  if (args[0] === "--version" || args[0] === "-v") {
    console.log(__VERSION__);
    return;
  }

  if (args[0] === "run") {
    await run(args.slice(1));
    return;
  }

  console.error(chalk.red(`Error: Unknown command "${args[0]}".`));
  console.error(chalk.blue("Run"), chalk.cyan("gangway --help"), chalk.blue("for usage."));
  process.exit(1);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(chalk.red("Error:"), message);
  process.exit(1);
});
