export const DEFAULT_REGISTER_COUNT = 16;
export const DEFAULT_RAM_SIZE = 1024;
export const DEFAULT_STACK_SIZE = 1024;
export const DEFAULT_BITS = 32;
export const MAX_BITS = 32; // cells are Uint32Array
