#!/usr/bin/env node
import * as fs from "node:fs";
import { runCli } from "../cli/run.js";

function main() {
  const exitCode = runCli(process.argv.slice(2), process.env, {
    fileExists: (filePath) => fs.existsSync(filePath),
    readFile: (filePath) => fs.readFileSync(filePath, "utf8"),
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
  process.exit(exitCode);
}

main();
