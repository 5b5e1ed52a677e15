#!/usr/bin/env node
/**
 * jwt-verify - Composition Root
 *
 * The program itself lives in src/cli/programs/jwt-verify.ts.
 */

import { createJwtVerifyProgram } from './cli/programs/jwt-verify.js';

createJwtVerifyProgram().parse();
