#!/usr/bin/env node
/**
 * Entry point of the `egeria` command.
 */

import { loadEnvFile } from '@egeria-sdk/core';
import { buildProgram } from './program.js';

loadEnvFile();
await buildProgram().parseAsync(process.argv);
