// Deterministic console output and defaults for every suite
process.env.NO_COLOR = '1';
process.env.CLI_BANNER = 'off';
for (const key of ['BLACKJACK_MIN_BET', 'BLACKJACK_MAX_BET', 'CARD_STYLE', 'LOG_FILE']) delete process.env[key];
