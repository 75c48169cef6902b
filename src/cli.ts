#!/usr/bin/env node
// src/cli.ts
import { runCli } from './app.js';

process.exitCode = runCli(process.argv.slice(2));
