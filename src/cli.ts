#!/usr/bin/env node
import "dotenv/config";

import { loadConfig } from "./config";
import { ContactStore } from "./services/contactStore";
import { runConsole } from "./services/directoryConsole";
import { logError } from "./utils/log";

async function main(): Promise<void> {
  const config = loadConfig();
  const store = new ContactStore(config.filePath);
  store.load();

  await runConsole({
    store,
    input: process.stdin,
    output: process.stdout,
    pageSize: config.pageSize,
  });
}

main().catch((error: unknown) => {
  logError("command_failed", error);
  process.exitCode = 1;
});
