#!/usr/bin/env node

import { config as loadDotenv } from 'dotenv'
import { main } from '../src/cli/cli'
import { exitWithError } from '../src/cli/errors'

// .env has to be applied before the assertion settings are first read
loadDotenv()

main().catch(exitWithError)
