#!/usr/bin/env node
import { runInventoryCLI } from './cli';

process.exitCode = runInventoryCLI(process.argv.slice(2));
