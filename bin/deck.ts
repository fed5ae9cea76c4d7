#!/usr/bin/env tsx
import { main } from "../src/main.ts";
import { ConfigError } from "../src/config.ts";

try {
  const code = await main(process.argv.slice(2));
  process.exit(code);
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`deck: ${message}\n`);
  if (err instanceof ConfigError) process.stderr.write(`Fix or remove ${err.filePath} and try again.\n`);
  process.exit(1);
}
