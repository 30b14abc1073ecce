#!/usr/bin/env node

import ansis from "ansis";
import { Runner } from "./execution/runner";

function showHelp(): void {
  console.log(`
${ansis.bold("shell-dispatch")} - run dependent task groups across shells

${ansis.bold("Usage:")}
  shell-dispatch [flags] <task file | directory>...

${ansis.bold("Flags:")}
  --var=NAME=VALUE         Global variable, overridden by task vars
  --override=NAME=VALUE    Variable that wins over task vars
  --enable=<pattern>       Enable tasks matching a name or glob
  --disable=<pattern>      Disable tasks matching a name or glob
  --run=<commands>         Add a task with one command per line
  --run-name=<name>        Name of the --run task (default: action_test)
  --run-shell=<shell>      Shell of the --run task (default: target)
  --run-requires=<a,b>     Tasks the --run task requires
  --dry-run                Print the resolved plan without running it
  -q, --quiet              Suppress output
  --no-prefix              Disable output prefixes
  --prefix=<str>           Custom prefix

${ansis.bold("Examples:")}
  shell-dispatch tasks/                        Run every task in tasks/
  shell-dispatch tasks/ --disable=*_network    Skip the network setup
  shell-dispatch tasks/ --run="uname -a" --run-requires=boot
  `);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    showHelp();
    return;
  }

  const runner = new Runner();
  const stop = (): void => {
    console.error(ansis.yellow("Stopping after the running tasks..."));
    runner.abort();
  };
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  process.exitCode = await runner.run(args);
}

main().catch((error) => {
  console.error(ansis.red("Fatal error:"), error);
  process.exit(1);
});
