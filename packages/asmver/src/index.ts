#!/usr/bin/env node

import { runMain } from 'citty'
import { updateCommand } from './commands/update.js'

runMain(updateCommand)
