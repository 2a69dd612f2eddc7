import { afterEach, describe, it, expect, vi } from 'vitest';
import { AssemblyError } from '../../src/assembler/errors';
import { resolveConfig } from '../../src/emulator/config';
import { Emulator } from '../../src/emulator/core';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Emulator wiring', () => {
  const EDGE = 'COL 0x00FF00\nDSP 3 3\nDSP 4 0\nDSP 0 9\nHLT';
  const small = { display_width: 4, display_height: 4 };

  it('forwards only in-range pixels to a custom display', () => {
    const setPixel = vi.fn();
    const emu = Emulator.fromSource(EDGE, resolveConfig(small), { display: { setPixel } });
    emu.dbg.runBatch(10);
    expect(emu.framebuffer).toBeUndefined();
    expect(setPixel).toHaveBeenCalledTimes(1);
    expect(setPixel).toHaveBeenCalledWith(3, 3, 0x00ff00);
  });

  it('creates a framebuffer of the configured size by default', () => {
    const emu = Emulator.fromSource(EDGE, resolveConfig(small));
    emu.dbg.runBatch(10);
    const fb = emu.framebuffer;
    expect(fb?.width).toBe(4);
    expect(fb?.writes).toBe(1);
    expect(fb?.dropped).toBe(0);
    expect(fb?.getPixel(3, 3)).toBe(0x00ff00);
  });

  it('has no display at all when display is off', () => {
    const setPixel = vi.fn();
    const emu = Emulator.fromSource(EDGE, resolveConfig({ ...small, display: false }), { display: { setPixel } });
    emu.dbg.runBatch(10);
    expect(emu.framebuffer).toBeUndefined();
    expect(setPixel).not.toHaveBeenCalled();
    expect(emu.cpu.state).toBe('halted');
  });

  it('prints to the console by default when printing is on', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const emu = Emulator.fromSource('PRT -7\nHLT', resolveConfig({ printing: true }));
    emu.dbg.runBatch(10);
    expect(log).toHaveBeenCalledWith('-7');
  });

  it('assembles with the configured register count', () => {
    let err: unknown;
    try {
      Emulator.fromSource('MOV r4 0', resolveConfig({ register_count: 4 }));
    } catch (e) {
      err = e;
    }
    expect(err).toBeInstanceOf(AssemblyError);
    expect(err instanceof AssemblyError && err.code).toBe('RegisterOutOfRange');
  });

  it('CLS clears the framebuffer', () => {
    const emu = Emulator.fromSource('COL 9\nDSP 1 1\nCLS\nDSP 0 0\nHLT', resolveConfig(small));
    emu.dbg.runBatch(10);
    const fb = emu.framebuffer;
    expect(fb?.getPixel(1, 1)).toBe(0);
    expect(fb?.getPixel(0, 0)).toBe(9);
    expect(fb?.writes).toBe(1);
  });

  it('CLS reaches a custom display only when it can clear', () => {
    const clear = vi.fn();
    Emulator.fromSource('CLS\nHLT', resolveConfig(small), { display: { setPixel: vi.fn(), clear } }).dbg.runBatch(10);
    expect(clear).toHaveBeenCalledTimes(1);

    const plain = Emulator.fromSource('CLS\nHLT', resolveConfig(small), { display: { setPixel: vi.fn() } });
    expect(plain.dbg.runBatch(10).reason).toBe('halted');
  });

  it('reset restarts the program and clears the display', () => {
    const emu = Emulator.fromSource('COL 5\nDSP 0 0\nHLT', resolveConfig({ display_width: 2, display_height: 2 }));
    emu.dbg.addBreakpoint(2);
    emu.dbg.runBatch(10);
    expect(emu.framebuffer?.getPixel(0, 0)).toBe(5);

    emu.reset();
    expect(emu.framebuffer?.getPixel(0, 0)).toBe(0);
    expect(emu.framebuffer?.writes).toBe(0);
    expect(emu.cpu.pc).toBe(0);
    expect(emu.cpu.color).toBe(0);
    expect(emu.dbg.steps).toBe(0);
    expect(emu.dbg.breakpoints()).toEqual([2]);
    expect(emu.config.displayWidth).toBe(2);
  });
});
