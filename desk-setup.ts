#!/usr/bin/env -S npx tsx
import { createProgram } from "./cli.ts";

await createProgram().parseAsync(process.argv);
