#!/usr/bin/env node
import { createCli } from "./cli/program.js";

await createCli().runExit(process.argv.slice(2));
