#!/usr/bin/env node
import { runCli } from "./cli/run-cli";

process.exitCode = await runCli({ argv: process.argv });
