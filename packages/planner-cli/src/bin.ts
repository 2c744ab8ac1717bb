#!/usr/bin/env node
import { createDefaultContext, runCli } from './cli';

process.exitCode = await runCli(process.argv, createDefaultContext());
