import { emitKeypressEvents, type Key } from 'readline';
import type { Action } from './state-machine.js';

const KEY_ACTIONS: Record<string, Action> = {
  up: 'up',
  k: 'up',
  down: 'down',
  j: 'down',
  pageup: 'pageUp',
  pagedown: 'pageDown',
  return: 'select',
  enter: 'select',
  escape: 'cancel',
  backspace: 'back',
  delete: 'back',
  space: 'toggleMark',
  c: 'deleteSelected',
  q: 'quit',
};

// Only reachable with Shift held (A, N, D)
const SHIFT_ACTIONS: Record<string, Action> = {
  a: 'markAll',
  n: 'clearMarks',
  d: 'deleteMarked',
};

export function keyToAction(key: Key | undefined): Action | null {
  if (!key?.name) return null;
  if (key.ctrl) {
    return key.name === 'c' ? 'quit' : null;
  }
  if (key.meta) return null;
  if (key.shift) {
    return SHIFT_ACTIONS[key.name] ?? KEY_ACTIONS[key.name] ?? null;
  }
  return KEY_ACTIONS[key.name] ?? null;
}

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
};

/**
 * Raw-mode keypress reader. `suspend` hands stdin back for a prompt
 * and `resume` takes it again.
 */
export class TerminalInput {
  private attached = false;

  constructor(
    private readonly onAction: (action: Action) => void,
    private readonly input: KeyInput = process.stdin
  ) {}

  start(): void {
    emitKeypressEvents(this.input);
    this.attach();
  }

  suspend(): void {
    this.detach();
  }

  resume(): void {
    this.attach();
  }

  stop(): void {
    this.detach();
    this.input.pause();
  }

  private readonly handleKeypress = (_text: string | undefined, key: Key | undefined): void => {
    const action = keyToAction(key);
    if (action) {
      this.onAction(action);
    }
  };

  private attach(): void {
    if (this.attached) return;
    if (this.input.isTTY) {
      this.input.setRawMode?.(true);
    }
    this.input.on('keypress', this.handleKeypress);
    this.input.resume();
    this.attached = true;
  }

  private detach(): void {
    if (!this.attached) return;
    this.input.off('keypress', this.handleKeypress);
    if (this.input.isTTY) {
      this.input.setRawMode?.(false);
    }
    this.attached = false;
  }
}
