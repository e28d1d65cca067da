#!/usr/bin/env node
/**
 * build-sync CLI entry.
 *
 * Keeps archon.gg talent builds in a WoW addon's SavedVariables file up to date
 * without touching the entries you made yourself.
 */

import { runCli } from './main.js'

await runCli(process.argv)
