import fs from 'fs';
import { MAX_BITS } from '../isa/limits';

// Immutable emulator configuration. Built once, passed to constructors.
export interface EmulatorConfig {
  readonly display: boolean;
  readonly printing: boolean;
  readonly recordTimings: boolean; // requires debug
  readonly debug: boolean;
  readonly textDebug: boolean;
  readonly simpleDebug: boolean;
  readonly timingGraph: boolean; // requires recordTimings
  readonly maxGraphPoints: number;
  readonly pixelScale: number;
  readonly displayWidth: number;
  readonly displayHeight: number;
  readonly bits: number;
  readonly registerCount: number;
  readonly ramSize: number;
  readonly stackSize: number;
  readonly graphUpdateFrequency: number; // batches between graph refreshes
  readonly batchSize: number;
  readonly windowUpdateInterval: number; // ms
}

export const DEFAULT_CONFIG: EmulatorConfig = Object.freeze({
  display: true,
  printing: false,
  recordTimings: true,
  debug: true,
  textDebug: false,
  simpleDebug: false,
  timingGraph: false,
  maxGraphPoints: 1000,
  pixelScale: 1,
  displayWidth: 200,
  displayHeight: 200,
  bits: 32,
  registerCount: 16,
  ramSize: 1024,
  stackSize: 1024,
  graphUpdateFrequency: 5,
  batchSize: 1000,
  windowUpdateInterval: 200,
});

export class ConfigError extends Error {
  constructor(public readonly key: string, message: string) {
    super(`config ${key}: ${message}`);
    this.name = 'ConfigError';
  }
}

const BOOLEAN_KEYS = ['display', 'printing', 'recordTimings', 'debug', 'textDebug', 'simpleDebug', 'timingGraph'] as const;
const INTEGER_KEYS = [
  'maxGraphPoints',
  'pixelScale',
  'displayWidth',
  'displayHeight',
  'bits',
  'registerCount',
  'ramSize',
  'stackSize',
  'graphUpdateFrequency',
  'batchSize',
  'windowUpdateInterval',
] as const;

type BooleanKey = (typeof BOOLEAN_KEYS)[number];
type IntegerKey = (typeof INTEGER_KEYS)[number];

export type RawConfig = Record<string, unknown>;

function isBooleanKey(key: string): key is BooleanKey {
  return (BOOLEAN_KEYS as readonly string[]).includes(key);
}

function isIntegerKey(key: string): key is IntegerKey {
  return (INTEGER_KEYS as readonly string[]).includes(key);
}

// snake_case (config.json) -> camelCase; camelCase passes through.
export function normaliseKey(key: string): string {
  return key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

function coerceBoolean(key: string, v: unknown): boolean {
  if (typeof v === 'boolean') return v;
  if (v === '1' || v === 'true') return true;
  if (v === '0' || v === 'false') return false;
  throw new ConfigError(key, `expected a boolean, got ${JSON.stringify(v)}`);
}

function coerceInteger(key: string, v: unknown): number {
  const n = typeof v === 'string' && v.trim() !== '' ? Number(v) : v;
  if (typeof n !== 'number' || !Number.isInteger(n)) {
    throw new ConfigError(key, `expected an integer, got ${JSON.stringify(v)}`);
  }
  // windowUpdateInterval may be 0 (refresh after every batch); every other size must be positive.
  const min = key === 'windowUpdateInterval' ? 0 : 1;
  if (n < min) throw new ConfigError(key, `must be >= ${min}, got ${n}`);
  return n;
}

/**
 * Merge `overrides` onto the defaults, validate every value and apply the prerequisite rules:
 * recordTimings needs debug, timingGraph needs recordTimings. An option whose prerequisite is
 * off resolves to false. Unknown keys are reported and ignored.
 */
export function resolveConfig(overrides: RawConfig = {}, warn: (msg: string) => void = console.warn): EmulatorConfig {
  const booleans: Record<BooleanKey, boolean> = {
    display: DEFAULT_CONFIG.display,
    printing: DEFAULT_CONFIG.printing,
    recordTimings: DEFAULT_CONFIG.recordTimings,
    debug: DEFAULT_CONFIG.debug,
    textDebug: DEFAULT_CONFIG.textDebug,
    simpleDebug: DEFAULT_CONFIG.simpleDebug,
    timingGraph: DEFAULT_CONFIG.timingGraph,
  };
  const integers: Record<IntegerKey, number> = {
    maxGraphPoints: DEFAULT_CONFIG.maxGraphPoints,
    pixelScale: DEFAULT_CONFIG.pixelScale,
    displayWidth: DEFAULT_CONFIG.displayWidth,
    displayHeight: DEFAULT_CONFIG.displayHeight,
    bits: DEFAULT_CONFIG.bits,
    registerCount: DEFAULT_CONFIG.registerCount,
    ramSize: DEFAULT_CONFIG.ramSize,
    stackSize: DEFAULT_CONFIG.stackSize,
    graphUpdateFrequency: DEFAULT_CONFIG.graphUpdateFrequency,
    batchSize: DEFAULT_CONFIG.batchSize,
    windowUpdateInterval: DEFAULT_CONFIG.windowUpdateInterval,
  };

  for (const [rawKey, value] of Object.entries(overrides)) {
    const key = normaliseKey(rawKey);
    if (isBooleanKey(key)) booleans[key] = coerceBoolean(rawKey, value);
    else if (isIntegerKey(key)) integers[key] = coerceInteger(rawKey, value);
    else warn(`[config] ignoring unknown option '${rawKey}'`);
  }

  if (integers.bits > MAX_BITS) throw new ConfigError('bits', `must be <= ${MAX_BITS}, got ${integers.bits}`);

  const recordTimings = booleans.recordTimings && booleans.debug;
  return Object.freeze({
    ...booleans,
    ...integers,
    recordTimings,
    timingGraph: booleans.timingGraph && recordTimings,
  });
}

export function loadConfigFile(path: string): RawConfig {
  let text: string;
  try {
    text = fs.readFileSync(path, 'utf8');
  } catch (e) {
    throw new ConfigError(path, `cannot read (${e instanceof Error ? e.message : String(e)})`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new ConfigError(path, `invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(path, 'expected a JSON object');
  }
  return { ...parsed };
}

// --key=value flags; bare --flag means true.
export function parseArgs(argv: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv) {
    const m = a.match(/^--([^=]+)(?:=(.*))?$/);
    if (m) out[m[1]] = m[2] ?? 'true';
  }
  return out;
}
