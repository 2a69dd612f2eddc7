import type { TimingSample } from './timingHistory';

export type { PixelSink } from '../display/framebuffer';

export type PrintSink = (value: number) => void;
export type TimingSink = (sample: TimingSample) => void;
export type LogSink = (line: string) => void;
