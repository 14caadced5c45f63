#!/usr/bin/env node
import { buildProgram } from "./cli/program/register.onboard.js";

await buildProgram().parseAsync(process.argv);
