import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from 'tessera-shared';
import { ConfigurationError } from './errors.js';
import { HAZARD_CATEGORIES } from './types.js';

const windowSchema = z.enum(['line', 'record', 'folio']);
const fraction = z.number().min(0).max(1);

const grammarRulesSchema = z.object({
  version: z.string().default('inline'),
  prefixes: z.array(z.string().min(1)),
  suffixes: z.array(z.string().min(1)),
  minMiddleLength: z.number().int().min(1).default(1),
  priority: z.array(z.string()).default([]),
  rejectPattern: z.string().nullable().default(null),
  requireAffix: z.boolean().default(false),
});

export const configSchema = z.object({
  project: z.object({
    name: z.string(),
    description: z.string(),
  }),
  corpus: z.object({
    path: z.string().min(1),
    format: z.enum(['auto', 'csv', 'json']),
    delimiter: z.string().length(1),
  }),
  grammar: z.object({
    path: z.string().min(1).nullable(),
    rules: grammarRulesSchema.optional(),
  }),
  index: z.object({
    positionBins: z.number().int().min(1).max(100),
  }),
  graph: z.object({
    window: windowSchema,
    recordSize: z.number().int().min(1),
    minCount: z.number().int().min(1),
  }),
  robustness: z.object({
    alternativeWindow: windowSchema,
    minAgreement: fraction,
  }),
  hubs: z.object({
    degreeZ: z.number().positive(),
    percolationThreshold: z.number().int().min(1),
  }),
  classification: z.object({
    classes: z.array(z.object({
      id: z.string().min(1),
      patterns: z.array(z.string().min(1)).min(1),
    })),
    minClassFrequency: z.number().int().min(1),
    roleRules: z.array(z.object({
      role: z.string().min(1),
      prefixes: z.array(z.string()).optional(),
      middles: z.array(z.string()).optional(),
      suffixes: z.array(z.string()).optional(),
    })),
    ruleAgreement: fraction,
    kRange: z.tuple([z.number().int().min(2), z.number().int().min(2)]),
    minSilhouette: z.number().min(-1).max(1),
    stabilityThreshold: fraction,
    escapeRoles: z.array(z.string()),
  }),
  hazards: z.object({
    alpha: z.number().gt(0).lt(1),
    minExpected: z.number().nonnegative(),
    shuffles: z.number().int().min(1),
    categories: z.array(z.object({
      fromRole: z.string().min(1),
      toRole: z.string().min(1),
      category: z.enum(HAZARD_CATEGORIES),
    })),
  }),
  permutation: z.object({
    shuffles: z.number().int().min(1),
    seed: z.number().int().nonnegative(),
    checkpointEvery: z.number().int().min(1),
  }),
  harness: z.object({
    concurrency: z.number().int().min(1).max(64),
    timeoutMs: z.number().int().positive(),
    minSampleSize: z.number().int().min(1),
  }),
  registry: z.object({
    maxRetries: z.number().int().min(0),
  }),
}).superRefine((c, ctx) => {
  if (c.classification.kRange[0] > c.classification.kRange[1]) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['classification', 'kRange'],
      message: `min ${c.classification.kRange[0]} exceeds max ${c.classification.kRange[1]}`,
    });
  }
  if (c.graph.window === c.robustness.alternativeWindow) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['robustness', 'alternativeWindow'],
      message: `must differ from graph.window (${c.graph.window})`,
    });
  }
  for (const [i, p] of c.classification.classes.flatMap(k => k.patterns).entries()) {
    try {
      new RegExp(p);
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['classification', 'classes', i],
        message: `invalid pattern ${p}`,
      });
    }
  }
});

export type TesseraConfig = z.infer<typeof configSchema>;

export { grammarRulesSchema };

let _cachedConfig: TesseraConfig | null = null;
let _cachedRoot: string | null = null;

export const CONFIG_DIR = '.tessera';

/**
 * Load .tessera/config.json with full defaults, validated. Cached per project root.
 * Throws ConfigurationError for unreadable JSON or any out-of-range option.
 */
export function loadConfig(projectRoot: string): TesseraConfig {
  if (_cachedConfig && _cachedRoot === projectRoot) return _cachedConfig;
  const configPath = path.join(projectRoot, CONFIG_DIR, 'config.json');

  let loaded: Record<string, unknown> = {};
  if (fs.existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
      if (!isPlainObject(parsed)) {
        throw new ConfigurationError(`${configPath} must contain a JSON object`);
      }
      loaded = parsed;
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      throw new ConfigurationError(`Cannot parse ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  _cachedConfig = parseConfig(mergeWithDefaults(loaded));
  _cachedRoot = projectRoot;
  return _cachedConfig;
}

/** Section-by-section merge over DEFAULT_CONFIG; unknown sections pass through to validation. */
export function mergeWithDefaults(loaded: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...loaded };
  for (const [section, defaults] of Object.entries(DEFAULT_CONFIG)) {
    const override = loaded[section];
    merged[section] = isPlainObject(override) ? { ...defaults, ...override } : override ?? { ...defaults };
  }
  return merged;
}

export function parseConfig(raw: unknown): TesseraConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  return result.data;
}

/** Clear cached config (for testing). */
export function resetConfigCache(): void {
  _cachedConfig = null;
  _cachedRoot = null;
}

/**
 * Extract a flag's value from args. Accepts `--flag value` and `--flag=value`.
 */
export function getFlagValue(args: string[], flag: string): string | undefined {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith(`${flag}=`)) return arg.slice(flag.length + 1);
    if (arg === flag) return i + 1 < args.length ? args[i + 1] : undefined;
  }
  return undefined;
}

/** Parse an integer flag; a present but non-integer value is a configuration error. */
export function getIntFlag(args: string[], flag: string): number | undefined {
  const raw = getFlagValue(args, flag);
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) {
    throw new ConfigurationError(`${flag} expects an integer, got "${raw}"`);
  }
  return n;
}

/** Positional arguments: everything that is not a flag or a flag's value. */
export function positionalArgs(args: string[], valueFlags: string[] = []): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      if (valueFlags.includes(arg)) i++;
      continue;
    }
    out.push(arg);
  }
  return out;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
