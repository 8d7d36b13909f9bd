#!/usr/bin/env tsx
import { run } from "./main.js";

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  });
