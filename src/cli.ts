#!/usr/bin/env node

// ═══════════════════════════════════════════════════════════════════════════════
// CLI — Inspect and Update Tag Profiles from the Shell
// ═══════════════════════════════════════════════════════════════════════════════
//
// Results are JSON on stdout; logs and errors go to stderr.
// With STORAGE_DRIVER=memory (the default) every run starts from an empty store.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { readFileSync } from 'node:fs';

import { loadConfig } from './config/index.js';
import { createProfileEngine, type ProfileEngine } from './index.js';
import { setLogSink } from './logging/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

const c = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
};

function print(value: unknown): void {
  process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
}

function fail(message: string): void {
  process.stderr.write(`${c.red}✗${c.reset} ${message}\n`);
  process.exitCode = 1;
}

function printHelp(): void {
  process.stdout.write(`
${c.bold}tag-profile${c.reset} - per-user tag profiles

${c.bold}Usage:${c.reset}
  tag-profile apply <userId> <file.json> [--extracted]   Apply an observation batch
  tag-profile profile <userId>                            Print the profile
  tag-profile timeline <userId> [--limit N]               Print timeline events
  tag-profile stats <userId>                              Print profile statistics
  tag-profile reset <userId>                              Replace the profile with an empty one
  tag-profile taxonomy                                    Print the loaded taxonomy
  tag-profile help                                        Show this help

${c.dim}--extracted reads category -> subcategory -> tags extractor output.
Set STORAGE_DRIVER=redis and REDIS_URL to keep profiles between runs.${c.reset}
`);
}

// ─────────────────────────────────────────────────────────────────────────────────
// ARGUMENTS
// ─────────────────────────────────────────────────────────────────────────────────

function readJsonFile(path: string): unknown {
  const text = readFileSync(path, 'utf-8');
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${path} is not valid JSON: ${reason}`, { cause: error });
  }
}

function parseLimit(args: string[]): number | undefined {
  const index = args.indexOf('--limit');
  if (index === -1) return undefined;
  const raw = args[index + 1];
  const limit = Number(raw);
  if (raw === undefined || !Number.isInteger(limit) || limit < 1) {
    throw new Error(`--limit expects a positive integer, got ${raw ?? 'nothing'}`);
  }
  return limit;
}

// ─────────────────────────────────────────────────────────────────────────────────
// COMMANDS
// ─────────────────────────────────────────────────────────────────────────────────

async function run(engine: ProfileEngine, command: string, args: string[]): Promise<void> {
  const { service } = engine;
  const userId = args[0];

  switch (command) {
    case 'apply': {
      const file = args[1];
      if (!userId || !file) return fail('Usage: tag-profile apply <userId> <file.json> [--extracted]');
      const input = readJsonFile(file);
      const profile = args.includes('--extracted')
        ? await service.applyExtraction(userId, input)
        : await service.applyObservations(userId, input);
      return print(profile);
    }
    case 'profile':
      if (!userId) return fail('Usage: tag-profile profile <userId>');
      return print(await service.getProfile(userId));
    case 'timeline':
      if (!userId) return fail('Usage: tag-profile timeline <userId> [--limit N]');
      return print(await service.getTimeline(userId, parseLimit(args)));
    case 'stats':
      if (!userId) return fail('Usage: tag-profile stats <userId>');
      return print(await service.getStats(userId));
    case 'reset':
      if (!userId) return fail('Usage: tag-profile reset <userId>');
      return print(await service.resetProfile(userId));
    case 'taxonomy':
      return print(engine.taxonomy.definition);
    default:
      return fail(`Unknown command: ${command}. Run tag-profile help for usage.`);
  }
}

async function main(): Promise<void> {
  const [command, ...args] = process.argv.slice(2);

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    printHelp();
    return;
  }

  setLogSink((_level, line) => {
    process.stderr.write(`${line}\n`);
  });

  const config = loadConfig();
  if (process.env.LOG_LEVEL === undefined && process.env.DEBUG === undefined) {
    config.logging.level = 'warn';
  }

  const engine = createProfileEngine(config);
  try {
    await run(engine, command, args);
  } finally {
    await engine.close();
  }
}

main().catch((error: unknown) => {
  fail(error instanceof Error ? error.message : String(error));
});
