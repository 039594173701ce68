#!/usr/bin/env node
/**
 * @bifgen/cli - builtin table generator
 *
 * Usage:
 *   bifgen <builtins> <overloads> <declarations> <definitions> <aliases>
 */

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2));
