#!/usr/bin/env node
import { runCli } from "./modules/update.js";

export async function main(argv = process.argv): Promise<void> {
  process.exitCode = await runCli(argv);
}

void main();
