#!/usr/bin/env node
/**
 * relaywatch CLI
 */

import { createProgram } from './program.js';

await createProgram().parseAsync();
