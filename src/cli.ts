#!/usr/bin/env node
// src/cli.ts
// Command line entry: faceshuffle <scramble|unscramble|help> ...

import { parseArgs, USAGE } from "./commands/args";
import { runScramble } from "./commands/scramble";
import { runUnscramble } from "./commands/unscramble";
import { loadShuffleConfig } from "./config";
import { ShuffleError, UsageError } from "./errors";
import { eLog } from "./logger";

/** Runs one command and returns the process exit code. */
export async function run(argv: readonly string[]): Promise<number> {
  try {
    const args = parseArgs(argv);
    const config = loadShuffleConfig();

    switch (args.command) {
      case "help":
        console.log(USAGE);
        return 0;
      case "scramble":
        await runScramble(args, config);
        return 0;
      case "unscramble":
        await runUnscramble(args, config);
        return 0;
    }
  } catch (err) {
    if (err instanceof UsageError) {
      eLog(`❌ ${err.message}`);
      eLog(USAGE);
      return err.exitCode;
    }
    if (err instanceof ShuffleError) {
      eLog(`❌ ${err.name}: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      eLog("[faceshuffle] unexpected failure", err);
      process.exitCode = 1;
    }
  );
}
