#!/usr/bin/env node
/**
 * Librus Scraper - CLI Entry Point
 */

import { buildProgram } from './cli.js';

await buildProgram().parseAsync(process.argv);
