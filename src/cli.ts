#!/usr/bin/env node
import { createPrettyLogHandler, setLogHandler } from '@stagecraft/core';
import { runCli } from './program.js';

setLogHandler(createPrettyLogHandler());

process.exitCode = await runCli(process.argv.slice(2));
