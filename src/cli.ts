#!/usr/bin/env tsx
import { cli } from "gunshi"
import { command, subCommands } from "./command.ts"
import { APP_NAME } from "./consts.ts"

const argv = process.argv.slice(2)

await cli(argv, command, {
  name: APP_NAME,
  version: "0.1.0",
  renderHeader: null,
  subCommands,
}).catch((error: unknown) => {
  console.error(`[${APP_NAME}] ${error instanceof Error ? error.message : String(error)}`)
  process.exitCode = 1
})
