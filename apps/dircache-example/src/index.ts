#!/usr/bin/env node

/**
 * dircache Example
 *
 * Demonstrates:
 * 1. Configuring a namespace from environment variables
 * 2. Saving and loading an entry
 * 3. Sweeping expired entries
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import { err, ok, type Result } from 'neverthrow';
import {
  createConsoleLogger,
  createFileCache,
  type CacheError,
  type CleanupReport,
  type FileCache,
} from 'dircache';
import { createExampleConfig } from './config.js';

/** Key the demo writes to */
export const DEMO_KEY = 'last-run';

/**
 * What a demo run stored, read back and swept.
 */
export interface DemoSummary {
  readonly stored: string;
  readonly loaded: string | undefined;
  readonly report: CleanupReport;
}

/**
 * Runs the save / load / sweep cycle against a configured cache.
 *
 * @param cache - Handle with an active namespace
 * @param print - Line sink for progress output
 */
export async function runDemo(
  cache: FileCache,
  print: (line: string) => void
): Promise<Result<DemoSummary, CacheError>> {
  const stored = new Date().toISOString();

  const saved = await cache.save(DEMO_KEY, Buffer.from(stored, 'utf8'));
  if (saved.isErr()) {
    return err(saved.error);
  }
  print(`[example] Saved ${DEMO_KEY} = ${stored}`);

  const loadedResult = await cache.load(DEMO_KEY);
  if (loadedResult.isErr()) {
    return err(loadedResult.error);
  }
  const loaded =
    loadedResult.value === undefined ? undefined : Buffer.from(loadedResult.value).toString('utf8');
  print(`[example] Loaded ${DEMO_KEY} = ${loaded ?? '(not found)'}`);

  const swept = await cache.cleanExpired();
  if (swept.isErr()) {
    return err(swept.error);
  }
  const report = swept.value;
  print(
    `[example] Swept ${String(report.examined)} entries, removed ${String(report.removed)}, ` +
      `${String(report.failures.length)} failed`
  );

  return ok({ stored, loaded, report });
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const config = createExampleConfig();
  const cache = createFileCache({ logger: createConsoleLogger({ level: config.logLevel }) });

  const configured = await cache.configure(config.namespace);
  if (configured.isErr()) {
    throw new Error(configured.error.message);
  }
  console.error(`[example] Cache directory: ${configured.value.directory}`);

  const result = await runDemo(cache, (line) => {
    console.error(line);
  });
  if (result.isErr()) {
    throw new Error(result.error.message);
  }
}

// Only run main if this is the entry point
const isMainModule =
  Boolean(process.argv[1]?.endsWith('index.js')) || Boolean(process.argv[1]?.endsWith('index.ts'));
if (isMainModule) {
  main().catch((error: unknown) => {
    console.error('[example] Fatal error:', error);
    process.exit(1);
  });
}
