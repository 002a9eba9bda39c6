#!/usr/bin/env node
import { describeError, main } from './app.js'
import { NAME } from './version.js'

main().then(
    code => process.exit(code),
    err => {
        process.stderr.write(`${NAME}: ${describeError(err)}\n`)
        process.exit(1)
    }
)
