#!/usr/bin/env -S npx tsx
/**
 * wetlands CLI entry point
 */

import { config as loadEnv } from 'dotenv';
import { createProgram } from './program.js';

// Load environment variables from .env (fallback)
loadEnv();

await createProgram().parseAsync();
