#!/usr/bin/env node
/**
 * glucoplot CLI
 *
 * Usage:
 *   glucoplot --input export.csv --output report.pdf
 *   glucoplot -i export.csv -o report.pdf --units mg/dL --graphs 3 --pagesize letter
 */

import { config as loadDotenv } from "dotenv";
import { createProgram } from "./program.js";

loadDotenv({ path: ".env.local" });

await createProgram().parseAsync();
