import chalk from 'chalk';
import { noColorRequested } from '../util/env.js';

export type Palette = {
  gradient: [string, string];
  info: (s: string) => string;
  success: (s: string) => string;
  warn: (s: string) => string;
  error: (s: string) => string;
  dim: (s: string) => string;
};

export type ThemeName = 'neo' | 'solarized' | 'mono';

export function themeName(raw = process.env.CLI_THEME): ThemeName {
  const t = (raw || 'neo').toLowerCase();
  return t === 'mono' || t === 'solarized' ? t : 'neo';
}

export function getPalette(name: ThemeName = themeName(), noColor = noColorRequested()): Palette {
  const c = new chalk.Instance({ level: noColor ? 0 : 3 });
  if (name === 'mono') {
    return {
      gradient: ['#777777', '#bbbbbb'],
      info: c.white,
      success: c.white,
      warn: c.white,
      error: c.white,
      dim: c.gray,
    };
  }
  if (name === 'solarized') {
    return {
      gradient: ['#268bd2', '#2aa198'],
      info: c.cyan,
      success: c.green,
      warn: c.yellow,
      error: c.red,
      dim: c.gray,
    };
  }
  // neo (default): neon blue/indigo
  return {
    gradient: ['#00d4ff', '#3b5bdb'],
    info: c.cyan,
    success: c.green,
    warn: c.yellow,
    error: c.red,
    dim: c.gray,
  };
}
