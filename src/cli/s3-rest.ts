#!/usr/bin/env tsx
import { runCli } from './program.ts'

runCli(process.argv.slice(2), { stdout: process.stdout, stderr: process.stderr }).then(
  (exitCode) => {
    process.exitCode = exitCode
  },
  (err: unknown) => {
    process.stderr.write(`${String(err)}\n`)
    process.exitCode = 2
  },
)
