// main.ts

import "dotenv/config";

import { runCli } from "./cli.ts";

runCli(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
