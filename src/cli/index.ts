#!/usr/bin/env node
import { BenchError } from "../core/errors.js";
import { buildProgram } from "./program.js";

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof BenchError) {
      console.error(`[bench] ${error.name}: ${error.message}`);
    } else {
      console.error(error);
    }
    process.exit(1);
  });
