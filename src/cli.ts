#!/usr/bin/env node
import { runMain } from 'citty';
import dotenv from 'dotenv';
import { main, toRawArgs } from './commands.js';

dotenv.config();

runMain(main, { rawArgs: toRawArgs(process.argv.slice(2)) });
