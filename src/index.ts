#!/usr/bin/env tsx
import { runCli } from "./cli";

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2), { stdout: process.stdout, env: process.env });
  process.exitCode = code;
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
