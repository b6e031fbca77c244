import type { Narrator } from '../games/blackjack/types.js';
import { ui, type Tone } from './ui.js';

export function consoleNarrator(): Narrator {
  return { say: (line: string, tone: Tone = 'plain') => ui.say(line, tone) };
}

/** Keeps every line; for tests and transcripts. */
export class RecordingNarrator implements Narrator {
  readonly lines: string[] = [];

  say(line: string): void {
    this.lines.push(line);
  }
}
