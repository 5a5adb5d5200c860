#!/usr/bin/env node
import { runCLI } from './cli-lib';

process.exitCode = runCLI(process.argv);
