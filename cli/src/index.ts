#!/usr/bin/env node

import { loadEnvFile } from "./config.js";
import { createProgram } from "./program.js";

// =============================================================================
// Run
// =============================================================================

loadEnvFile();
createProgram().parse();
