#!/usr/bin/env node

/**
 * CLI entry point for the INHA album downloader
 */

import { createProgram } from "./program";

await createProgram().parseAsync();
