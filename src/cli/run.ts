import fs from 'fs';
import { parseInteger } from '../assembler/assembler';
import { AssemblyError } from '../assembler/errors';
import { writePNG } from '../display/png';
import { ConfigError, loadConfigFile, parseArgs, resolveConfig, type RawConfig } from '../emulator/config';
import { Emulator } from '../emulator/core';
import { Scheduler } from '../emulator/scheduler';

// Flags handled here; every other --key=value is a config override.
const SCRIPT_FLAGS = new Set(['config', 'out', 'break', 'maxBatches']);

const USAGE =
  'Usage: npm run emulate -- <program.asm> [--config=config.json] [--out=frame.png] [--break=LABEL|index,...] [--maxBatches=N] [--<option>=<value> ...]';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_USAGE = 2;

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

// Breakpoint tokens are instruction indices (decimal or 0x hex) or label names.
function resolveBreakpoint(emu: Emulator, token: string): number {
  const index = parseInteger(token);
  if (index !== null) {
    try {
      emu.dbg.addBreakpoint(index);
    } catch (e) {
      if (e instanceof RangeError) throw new UsageError(`--break: ${e.message}`);
      throw e;
    }
    return index;
  }
  if (!emu.program.labels.has(token)) throw new UsageError(`--break: unknown label '${token}'`);
  return emu.dbg.addBreakpointAtLabel(token);
}

async function execute(argv: readonly string[]): Promise<number> {
  const sourcePath = argv.find((a) => !a.startsWith('--'));
  if (!sourcePath) throw new UsageError(USAGE);
  const args = parseArgs(argv);

  const fileConfig: RawConfig = args.config ? loadConfigFile(args.config) : fs.existsSync('config.json') ? loadConfigFile('config.json') : {};
  const overrides: RawConfig = { ...fileConfig };
  for (const [k, v] of Object.entries(args)) if (!SCRIPT_FLAGS.has(k)) overrides[k] = v;
  const config = resolveConfig(overrides);

  if (!fs.existsSync(sourcePath)) throw new UsageError(`no such program: ${sourcePath}`);
  const source = fs.readFileSync(sourcePath, 'utf8');
  const emu = Emulator.fromSource(source, config);
  console.log(`[run] ${sourcePath}: ${emu.program.instructions.length} instructions, ${emu.program.labels.size} labels  bits=${config.bits} batch=${config.batchSize} debug=${config.debug} timings=${config.recordTimings}`);

  for (const token of (args.break ?? '').split(',').filter((s) => s.length > 0)) {
    const index = resolveBreakpoint(emu, token);
    console.log(`[run] breakpoint at ${index}${emu.program.labels.has(token) ? ` (${token})` : ''}`);
  }

  const maxBatches = args.maxBatches ? Number(args.maxBatches) : undefined;
  const sched = new Scheduler(emu.dbg, {
    onRefresh: (s) => {
      if (config.debug) console.log(`[run] pc=${s.pc} steps=${s.stepsExecuted} state=${s.state}${s.instruction ? `  next: ${s.instruction}` : ''}`);
    },
    onGraphUpdate: (samples) => {
      const t = emu.dbg.timings;
      if (t) console.log(`[run][timing] samples=${samples.length} median=${t.median().toFixed(3)}us mean=${t.mean().toFixed(3)}us`);
    },
  });

  let result = await sched.run({ maxBatches });
  while (result.reason === 'breakpoint') {
    const s = emu.dbg.snapshot();
    console.log(`[run] hit breakpoint at ${s.pc} (line ${s.line ?? '-'}) ${s.instruction ?? ''}  r=[${s.signed.join(', ')}]`);
    result = await sched.run({ maxBatches });
  }

  if (emu.framebuffer && args.out) {
    await writePNG(emu.framebuffer, args.out, config.pixelScale);
    console.log(`[run] wrote ${args.out} (${emu.framebuffer.width * config.pixelScale}x${emu.framebuffer.height * config.pixelScale}), ${emu.framebuffer.writes} pixel writes`);
  }

  if (result.fault) {
    const f = result.fault;
    console.error(`[run] fault ${f.code} at instruction ${f.pc} (${f.opcode}, line ${f.line}) after ${result.steps} steps`);
    return EXIT_FAILED;
  }
  if (result.state !== 'halted') {
    console.error(`[run] stopped (${result.reason}) before halting after ${result.steps} steps`);
    return EXIT_FAILED;
  }
  console.log(`[run] halted after ${result.steps} steps`);
  return EXIT_OK;
}

/**
 * Assemble and run a program file headlessly. Resolves with the process exit code:
 * 0 when the program halts, 1 on a fault, an assembly or config error, or a run that
 * stops before halting, 2 on bad command-line usage. Unexpected errors propagate.
 */
export async function runCli(argv: readonly string[]): Promise<number> {
  try {
    return await execute(argv);
  } catch (e) {
    if (e instanceof UsageError) {
      console.error(`[run] ${e.message}`);
      return EXIT_USAGE;
    }
    if (e instanceof AssemblyError) {
      console.error(`[run] assembly failed: ${e.message}`);
      return EXIT_FAILED;
    }
    if (e instanceof ConfigError) {
      console.error(`[run] ${e.message}`);
      return EXIT_FAILED;
    }
    throw e;
  }
}
