#!/usr/bin/env node

import process from 'node:process'
import { red } from 'kleur/colors'
import type { CliConfig } from './config'
import { HELP, parseCliArgs, wantsHelp } from './config'
import { FatalConfigError } from './errors'
import { runPhotoShelf } from './index'

const argv = process.argv.slice(2)

if (wantsHelp(argv)) {
  console.log(HELP)
  process.exit(0)
}

function fail(err: unknown): never {
  if (err instanceof FatalConfigError)
    console.error(red(`❌ ${err.message} Use --help for usage.`))
  else
    console.error('❌ Fatal:', err)
  process.exit(1)
}

let config: CliConfig
try {
  config = parseCliArgs(argv)
}
catch (err) {
  fail(err)
}

runPhotoShelf(config).catch(fail)
