#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig } from '../shared/config.js';
import { NewsDigestError, errorMessage } from '../shared/errors.js';
import { generateId, getAppDir, resolvePath } from '../shared/utils.js';
import { APP_NAME, APP_VERSION } from '../shared/version.js';
import { startServer } from '../api/server.js';
import { createServices, executeRun } from '../engine/runner.js';
import { summarizeRun } from '../engine/pipeline.js';
import { encodeServiceAccountFile } from '../store/credentials.js';
import { doctorReport } from './doctor.js';

const program = new Command();

program
  .name(APP_NAME)
  .description('Research, rate and publish a daily AI news digest')
  .version(APP_VERSION);

// === serve ===
program
  .command('serve')
  .description('Start the HTTP trigger (GET / and GET /run) and the optional scheduler')
  .option('-p, --port <port>', 'Port to listen on', (value) => Number.parseInt(value, 10))
  .action(async (opts: { port?: number }) => {
    await startServer({ port: opts.port });
  });

// === run ===
program
  .command('run')
  .description('Run the pipeline once and print a summary')
  .option('--json', 'Print the full run report as JSON')
  .action(async (opts: { json?: boolean }) => {
    const config = await loadConfig();
    const report = await executeRun(config, createServices(config), generateId());

    if (opts.json) {
      log(JSON.stringify(report, null, 2));
    } else {
      log(summarizeRun(report));
    }
  });

// === encode-creds ===
program
  .command('encode-creds <file>')
  .description('Encode a service-account JSON key for GOOGLE_CREDENTIALS_BASE64')
  .option('-o, --out <file>', 'Write the encoded value to a file instead of stdout')
  .action((file: string, opts: { out?: string }) => {
    const encoded = encodeServiceAccountFile(resolvePath(file));
    if (opts.out) {
      fs.writeFileSync(resolvePath(opts.out), encoded, 'utf-8');
      log(`✓ Encoded credential written to ${opts.out}. Set it as GOOGLE_CREDENTIALS_BASE64.`);
    } else {
      log(encoded);
    }
  });

// === config ===
const configCmd = program.command('config').description('Manage configuration');

configCmd
  .command('init')
  .description('Write a default config file')
  .option('-f, --file <file>', 'Target path', path.join(getAppDir(), 'config.yaml'))
  .option('--force', 'Overwrite an existing file')
  .action((opts: { file: string; force?: boolean }) => {
    const target = resolvePath(opts.file);
    if (fs.existsSync(target) && !opts.force) {
      log(`Config already exists: ${target} (use --force to overwrite)`);
      return;
    }
    writeDefaultConfig(target);
    log(`✓ Config written to ${target}`);
  });

// === doctor ===
program
  .command('doctor')
  .description('Check which collaborators are configured')
  .action(async () => {
    const config = await loadConfig();
    for (const line of doctorReport(config)) {
      log(line);
    }
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(err instanceof NewsDigestError ? `${err.name}: ${err.message}` : errorMessage(err));
  process.exitCode = 1;
});
