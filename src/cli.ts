#!/usr/bin/env node
import { createProgram } from "./CliProgram";

createProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error(`error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
});
