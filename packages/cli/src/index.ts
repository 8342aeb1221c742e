#!/usr/bin/env node

import { createProgram } from "./program.js";
import { loadEnv } from "./utils/api-key.js";

export { createProgram, VERSION } from "./program.js";
export { loadEnv } from "./utils/api-key.js";

loadEnv();

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error("mux failed:", err);
    process.exit(1);
  });
