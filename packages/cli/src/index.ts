#!/usr/bin/env tsx

/**
 * lenslab CLI
 */

import { existsSync, readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import chalk from 'chalk'
import { createProgram } from './program'
import {
  type CommanderErrorInfo,
  CommanderErrorSchema,
  PackageJsonSchema,
  validate,
} from './schemas'

function getVersion(): string {
  const __filename = fileURLToPath(import.meta.url)
  const __dirname = dirname(__filename)
  const pkgPath = join(__dirname, '..', 'package.json')
  if (existsSync(pkgPath)) {
    const pkg = validate(
      JSON.parse(readFileSync(pkgPath, 'utf-8')),
      PackageJsonSchema,
      'package.json',
    )
    return pkg.version
  }
  return '0.1.0'
}

const program = createProgram({ version: getVersion() })

try {
  await program.parseAsync(process.argv)
} catch (error) {
  // Commander throws objects with code/message properties
  const parsed = CommanderErrorSchema.safeParse(error)
  const err: CommanderErrorInfo = parsed.success
    ? parsed.data
    : { message: String(error) }

  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed') {
    process.exit(0)
  }

  if (err.code === 'commander.version') {
    process.exit(0)
  }

  // Commander has already printed its own usage errors
  if (err.exitCode === undefined) {
    console.error(chalk.red(`\nError: ${err.message ?? 'Unknown error'}\n`))
  }
  process.exit(err.exitCode ?? 1)
}
