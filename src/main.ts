#!/usr/bin/env node
import 'reflect-metadata';
import 'dotenv/config';
import { runCli } from './cli.js';

runCli().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
