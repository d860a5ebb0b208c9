#!/usr/bin/env node

/**
 * cfmigrate CLI - Route53 / Cloudflare record set comparison
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { runCli } from './program.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(
  await fs.readFile(path.join(__dirname, '..', 'package.json'), 'utf-8')
);

process.exitCode = await runCli(process.argv.slice(2), { version: pkg.version });
