import type { InputState, Vec2 } from '../core/types';

const CAPTURED_KEYS = ['arrowup', 'arrowdown', 'arrowleft', 'arrowright', 'w', 'a', 's', 'd', ' ', 'escape', 'p', 'enter'];

export class KeyboardInput {
  private pressed = new Set<string>();
  private pauseQueued = false;

  constructor(private readonly target: Window = window) {
    target.addEventListener('keydown', this.onKeyDown);
    target.addEventListener('keyup', this.onKeyUp);
  }

  destroy() {
    this.target.removeEventListener('keydown', this.onKeyDown);
    this.target.removeEventListener('keyup', this.onKeyUp);
  }

  private onKeyDown = (e: KeyboardEvent) => {
    const key = e.key.toLowerCase();
    if (CAPTURED_KEYS.includes(key)) e.preventDefault();
    this.pressed.add(key);
    if (key === 'p' || key === 'escape') this.pauseQueued = true;
  };

  private onKeyUp = (e: KeyboardEvent) => {
    this.pressed.delete(e.key.toLowerCase());
  };

  readMovement(): Vec2 {
    const left = this.pressed.has('arrowleft') || this.pressed.has('a') ? -1 : 0;
    const right = this.pressed.has('arrowright') || this.pressed.has('d') ? 1 : 0;
    const up = this.pressed.has('arrowup') || this.pressed.has('w') ? -1 : 0;
    const down = this.pressed.has('arrowdown') || this.pressed.has('s') ? 1 : 0;
    return { x: left + right, y: up + down };
  }

  consumePausePressed() {
    const v = this.pauseQueued;
    this.pauseQueued = false;
    return v;
  }

  consumeRestartPressed() {
    return this.pressed.has('enter');
  }

  readInput(): InputState {
    return {
      movement: this.readMovement(),
      fire: this.pressed.has(' '),
      pausePressed: this.consumePausePressed(),
    };
  }
}
