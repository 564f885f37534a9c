import readline from 'readline';
import { InvalidConfigurationError } from '#shared';
import { loadConfig } from './config';
import { GameHost } from './host/GameHost';
import { parseInputLine } from './host/input';
import { logger } from './logger';

// ============================================
// Headless Host
// Clicks arrive on stdin as "x y" or "click x y"; "quit" stops the game.
// Exit code: 0 win, 1 lose or quit, 2 startup failure.
// ============================================

async function main(): Promise<number> {
  const config = loadConfig();
  const host = new GameHost(config);

  host.session.events.on('levelShown', ({ level }) => {
    logger.info({ event: 'banner', level }, `Level ${level}`);
  });
  host.session.events.on('gameOver', ({ outcome, level }) => {
    logger.info({ event: 'banner', outcome, level }, outcome === 'win' ? 'You Win' : 'You Lose');
  });

  const input = readline.createInterface({ input: process.stdin, terminal: false });
  input.on('line', (line) => {
    const command = parseInputLine(line);
    switch (command.type) {
      case 'click':
        host.click(command.x, command.y);
        break;
      case 'quit':
        host.stop('quit');
        break;
      case 'invalid':
        logger.warn({ event: 'bad_input', line: command.line }, `Ignoring input: ${command.line}`);
        break;
      case 'empty':
        break;
    }
  });

  const outcome = await host.run();
  input.close();
  return outcome === 'win' ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    if (error instanceof InvalidConfigurationError) {
      logger.error({ event: 'invalid_configuration', field: error.field }, error.message);
    } else {
      logger.error(
        {
          event: 'fatal_error',
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        'Host crashed'
      );
    }
    process.exitCode = 2;
  });
