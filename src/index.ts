#!/usr/bin/env node
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import { log } from './cli/logger.js';
import { consoleNarrator } from './cli/narrator.js';
import { createPrompter, readlineSource } from './cli/prompt.js';
import { ui } from './cli/ui.js';
import { getConfig } from './config/index.js';
import { createTable } from './games/blackjack/participants.js';
import { runSession } from './games/blackjack/session.js';
import { formatDollars, deltaBadge } from './ui/outcome.js';
import { ConfigError, InputClosedError, normalizeError } from './util/errors.js';

function safeReadPkgVersion() {
  try {
    const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  } catch (e) {
    log.debug('package.json unreadable', 'main', { error: normalizeError(e).message });
  }
  return '0.0.0';
}

async function main() {
  const cfg = getConfig();
  ui.banner(safeReadPkgVersion());

  const narrator = consoleNarrator();
  const lines = readlineSource();
  const input = createPrompter(lines, narrator);
  const table = createTable();
  try {
    const summary = await runSession(table, { input, narrator }, { limits: cfg.limits, cardStyle: cfg.cardStyle });
    const delta = summary.finalTotal - summary.startingTotal;
    ui.say(`Rounds played: ${summary.rounds.length}. You leave with ${formatDollars(summary.finalTotal)} (${deltaBadge(delta)}).`, 'title');
  } catch (e) {
    if (!(e instanceof InputClosedError)) throw e;
    ui.say('Input closed. Goodbye.', 'dim');
  } finally {
    lines.close();
    log.flush();
  }
}

main().catch((e: unknown) => {
  if (e instanceof ConfigError) {
    for (const issue of e.issues) ui.say(issue, 'error');
  } else {
    log.error('blackjack crashed', 'main', e);
  }
  log.flush();
  process.exitCode = 1;
});
