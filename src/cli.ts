#!/usr/bin/env node
import * as dotenv from 'dotenv';

import { runCli } from './runCli.js';

// Values already exported in the shell take precedence over the file.
dotenv.config();

process.exitCode = await runCli(process.argv.slice(2), process.env);
