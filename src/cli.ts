import { runCli } from "./cli-client";

/**
 * Execute the CLI when this file is run directly.
 *
 * Tests import `runCli()` from `./cli-client` instead.
 */
runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exitCode = 1;
  });
