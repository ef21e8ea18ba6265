#!/usr/bin/env node
import { run } from './lib.js';

process.exitCode = run(process.argv.slice(2));
