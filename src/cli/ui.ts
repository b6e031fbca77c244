import boxen from 'boxen';
import chalk from 'chalk';
import figlet from 'figlet';
import gradient from 'gradient-string';
import logSymbols from 'log-symbols';
import { getPalette } from './theme.js';
import { isInteractive, isTestEnv, noColorRequested } from '../util/env.js';

export type Tone = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title' | 'plain';

const palette = getPalette();

let bannerPrinted = false;

function banner(version: string) {
  if (process.env.CLI_BANNER === 'off' || process.env.CLI_BANNER === '0') return;
  if (bannerPrinted || !isInteractive() || noColorRequested()) return;
  bannerPrinted = true;
  const title = figlet.textSync('Blackjack', { font: 'Standard' });
  const body = `${gradient(palette.gradient).multiline(title)}\n\n${palette.dim('v' + version)}  ${palette.dim(process.version)}`;
  console.log(boxen(body, { padding: 1, borderColor: 'cyan', borderStyle: 'round' }));
}

function format(msg: string, tone: Tone): string {
  switch (tone) {
    case 'success': return `${logSymbols.success} ${palette.success(msg)}`;
    case 'warn': return `${logSymbols.warning} ${palette.warn(msg)}`;
    case 'error': return `${logSymbols.error} ${palette.error(msg)}`;
    case 'dim': return palette.dim(msg);
    case 'title': return chalk.bold(palette.info(msg));
    case 'info': return `${logSymbols.info} ${palette.info(msg)}`;
    default: return msg;
  }
}

function say(msg: string, tone: Tone = 'plain') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  console.log(format(msg, tone));
}

export const ui = { banner, say, format };
export default ui;
