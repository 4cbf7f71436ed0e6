#!/usr/bin/env node
import { run } from "./src/cli";
import { Defaults } from "./src/constants";
import { log } from "./src/log";

export async function main(argv: string[]): Promise<number> {
  try {
    return await run(argv);
  } catch (error) {
    // A status bar should show a placeholder, never a stack trace.
    log.error("Main", "Unexpected failure", error);
    process.stdout.write(`${Defaults.FAILURE_MESSAGE}\n`);
    return 0;
  }
}

if (require.main === module) {
  void main(process.argv.slice(2)).then((code) => {
    process.exitCode = code;
  });
}
