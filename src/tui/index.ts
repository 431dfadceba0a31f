// TUI module entry point
// Input state machine, renderer and the terminal-kit presenter

export { type KeyContext, type MachineState, createInputState, createMachineState, handleKey } from './input.js';
export { charKey, fromTermKitKey, namedKey, parseKeySpec, typeText } from './keys.js';
export { type Identity, type RenderView, type ScreenSize, renderFrame } from './render.js';
export { CellGrid, type CellStyle } from './grid.js';
export { createTUI, encodeRow, type TUI, type TUIOptions } from './tui-termkit.js';
export type { Command, EphemeralHint, InputState, KeyEvent, Mode } from './types.js';
