import { describe, expect, test } from '@jest/globals';
import logSymbols from 'log-symbols';
import { getPalette, themeName } from '../src/cli/theme.js';
import { ui } from '../src/cli/ui.js';

describe('cli theme', () => {
  test('theme names fall back to neo', () => {
    expect(themeName('SOLARIZED')).toBe('solarized');
    expect(themeName('mono')).toBe('mono');
    expect(themeName('nope')).toBe('neo');
    expect(themeName(undefined)).toBe('neo');
  });

  test('no colour means plain text', () => {
    const p = getPalette('neo', true);
    expect(p.info('hello')).toBe('hello');
    expect(p.dim('$5')).toBe('$5');
  });

  test('tones prefix log symbols', () => {
    expect(ui.format('careful', 'warn')).toBe(`${logSymbols.warning} careful`);
    expect(ui.format('quiet', 'dim')).toBe('quiet');
    expect(ui.format('as is', 'plain')).toBe('as is');
  });
});
