#!/usr/bin/env -S node --import tsx

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { TesseraError } from './errors.js';
import * as fmt from './output/format.js';

const VERSION: string = readVersion();

function readVersion(): string {
  const pkgPath = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return;
  }

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printHelp();
    return;
  }

  const isJson = args.includes('--json');
  const command = args[0];
  const rest = args.slice(1).filter(a => a !== '--json');

  try {
    switch (command) {
      case 'init': {
        const { init } = await import('./commands/init.js');
        await init(rest, isJson);
        break;
      }
      case 'status': {
        const { status } = await import('./commands/status.js');
        await status(isJson);
        break;
      }
      case 'decompose': {
        const { decompose } = await import('./commands/corpus.js');
        await decompose(rest, isJson);
        break;
      }
      case 'build-graph': {
        const { buildGraphCmd } = await import('./commands/graph.js');
        await buildGraphCmd(rest, isJson);
        break;
      }
      case 'validate-robustness': {
        const { validateRobustnessCmd } = await import('./commands/graph.js');
        await validateRobustnessCmd(rest, isJson);
        break;
      }
      case 'classify': {
        const { classifyCmd } = await import('./commands/classify.js');
        await classifyCmd(rest, isJson);
        break;
      }
      case 'list-tests': {
        const { listTests } = await import('./commands/tests.js');
        await listTests(isJson);
        break;
      }
      case 'run-test': {
        const { runTestCmd } = await import('./commands/tests.js');
        await runTestCmd(rest, isJson);
        break;
      }
      case 'run-tests': {
        const { runTests } = await import('./commands/tests.js');
        await runTests(rest, isJson);
        break;
      }
      case 'propose': {
        const { propose } = await import('./commands/registry.js');
        await propose(rest, isJson);
        break;
      }
      case 'resolve': {
        const { resolve } = await import('./commands/registry.js');
        await resolve(rest, isJson);
        break;
      }
      case 'supersede': {
        const { supersede } = await import('./commands/registry.js');
        await supersede(rest, isJson);
        break;
      }
      case 'history': {
        const { history } = await import('./commands/registry.js');
        await history(rest, isJson);
        break;
      }
      case 'export-registry': {
        const { exportRegistry } = await import('./commands/registry.js');
        await exportRegistry(rest, isJson);
        break;
      }
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    if (isJson) {
      console.error(JSON.stringify({ error: err instanceof Error ? err.name : 'Error', message: msg }));
    } else {
      fmt.error(`Error: ${msg}`);
    }
    process.exit(err instanceof TesseraError ? err.exitCode : 1);
  }
}

function printHelp(): void {
  console.log(`
tessera v${VERSION} — Constraint discovery and validation over a token corpus

Usage: tessera <command> [options] [--json]

Project:
  init [--name N] [--corpus PATH]    Create .tessera/ with config and database
       [--window W] [--seed S] [--force]
  status                             Registry head, counts, last runs, readiness

Pipeline:
  decompose [corpus]                 Decompose tokens, write the index artifact
  build-graph [--window W]           Compatibility graph, hubs, coverage
  validate-robustness [--window W]   Edge stability across windowing schemes
  classify                           Instruction classes, roles, hazards, profiles

Tests:
  list-tests                         Registered hypothesis tests
  run-test <id>                      Run one test and link its verdict
    --shuffles N --seed S            Permutation parameters
    --constraint C###                Resolve this constraint instead of proposing
  run-tests [ids...]                 Run the battery (default: every test)

Registry:
  propose "statement" --tier T       New PROPOSED constraint
    --evidence JSON                  Evidence object or array
  resolve <id> <status>              CONFIRMED, PARTIAL or FALSIFIED
  supersede <old> <new>              Mark <old> SUPERSEDED by <new>
  history <id>                       Full revision history
  export-registry                    Snapshot as JSON
    --tier<=T | --max-tier T         Keep tiers up to T
    --status S[,S...]                Keep these statuses
    --out FILE                       Write to FILE instead of stdout

Flags take either --flag value or --flag=value.
Exit codes: 0 ok, 1 corpus or usage error, 2 registry conflict, 3 configuration error.
`);
}

main().catch((err: unknown) => {
  fmt.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
