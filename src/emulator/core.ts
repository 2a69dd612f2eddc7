import { assemble } from '../assembler/assembler';
import { CPU, type CPUHooks } from '../cpu/cpu';
import { Framebuffer } from '../display/framebuffer';
import type { Program } from '../isa/types';
import { resolveConfig, type EmulatorConfig } from './config';
import { Debugger } from './debugger';
import type { LogSink, PixelSink, PrintSink, TimingSink } from './types';

export interface EmulatorIO {
  display?: PixelSink; // defaults to a Framebuffer of the configured size
  print?: PrintSink; // defaults to console.log
  onTimingSample?: TimingSink;
  log?: LogSink;
}

export class Emulator {
  constructor(
    public readonly program: Program,
    public readonly cpu: CPU,
    public readonly dbg: Debugger,
    public readonly framebuffer: Framebuffer | undefined,
  ) {}

  static fromSource(source: string, config: EmulatorConfig = resolveConfig(), io: EmulatorIO = {}): Emulator {
    return Emulator.fromProgram(assemble(source, config.registerCount), config, io);
  }

  static fromProgram(program: Program, config: EmulatorConfig = resolveConfig(), io: EmulatorIO = {}): Emulator {
    const hooks: CPUHooks = {};
    let framebuffer: Framebuffer | undefined;

    if (config.display) {
      const { displayWidth: w, displayHeight: h } = config;
      let sink: PixelSink;
      if (io.display) {
        sink = io.display;
      } else {
        framebuffer = new Framebuffer(w, h);
        sink = framebuffer;
      }
      // Only in-range pixels reach the display.
      hooks.onPixel = (x, y, color) => {
        if (x < w && y < h) sink.setPixel(x, y, color);
      };
      hooks.onClear = () => sink.clear?.();
    }
    if (config.printing) {
      hooks.onPrint = io.print ?? ((value) => console.log(String(value)));
    }

    const cpu = new CPU(
      program,
      {
        registerCount: config.registerCount,
        ramSize: config.ramSize,
        stackSize: config.stackSize,
        bits: config.bits,
        printing: config.printing,
      },
      hooks,
    );
    const dbg = new Debugger(cpu, config, { onTimingSample: io.onTimingSample, log: io.log });
    return new Emulator(program, cpu, dbg, framebuffer);
  }

  get config(): EmulatorConfig {
    return this.dbg.config;
  }

  // Restart the program from instruction 0 with cleared state; breakpoints survive.
  reset(): void {
    this.dbg.reset();
    this.framebuffer?.clear();
  }
}
