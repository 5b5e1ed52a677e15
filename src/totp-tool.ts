#!/usr/bin/env node
/**
 * totp-tool - Composition Root
 *
 * Subcommands are defined in src/cli/programs/totp-tool.ts; their logic lives
 * in src/cli/commands/*.ts.
 */

import { createTotpToolProgram } from './cli/programs/totp-tool.js';

createTotpToolProgram().parse();
