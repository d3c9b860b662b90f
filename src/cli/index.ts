#!/usr/bin/env node
/**
 * tictactoe-search CLI entry point.
 *
 * Plays one automated game and prints each move.
 *
 * Usage:
 *   tictactoe-search <seed> [--engine alphabeta|minimax|rollout] [--first x|o]
 *
 * Options:
 *   --engine              Scoring engine (default: alphabeta)
 *   --first               Side that moves first (default: o)
 *   --cache               Enable the transposition cache
 *   --heuristic-ordering  Sort moves by the static heuristic before searching
 *   --no-killers          Disable killer-move ordering
 *   --killer-capacity     Killer table size (default: 4)
 *   --playouts            Random playouts per rollout estimate (default: 500)
 *   --verbose             Enable detailed logging
 */
import { Command, Option } from 'commander';
import { playGame } from '../search/coordinator';
import { DEFAULT_ALPHABETA_CONFIG, DEFAULT_PLAYOUTS, EngineName, Side } from '../core/types';
import {
  parseEngine,
  parseKillerCapacity,
  parsePlayouts,
  parseSeed,
  parseSide,
} from '../utils/options';
import { enableVerbose, createLogger } from '../utils/logger';
import { formatResult, formatTurn } from './output';

interface CliOptions {
  engine: EngineName;
  first: Side;
  cache: boolean;
  heuristicOrdering: boolean;
  killers: boolean;
  killerCapacity: number;
  playouts: number;
  verbose?: boolean;
}

const logger = createLogger('cli');
const program = new Command();

program
  .name('tictactoe-search')
  .description('Tic-tac-toe self-play with alpha-beta and Monte Carlo rollout engines')
  .version('1.0.0')
  .argument('<seed>', 'Random seed for tie-breaking and rollouts', parseSeed)
  .addOption(
    new Option('--engine <name>', 'Scoring engine: alphabeta, minimax or rollout')
      .argParser(parseEngine)
      .default('alphabeta')
  )
  .addOption(
    new Option('--first <side>', 'Side that moves first: x or o')
      .argParser(parseSide)
      .default('minimizer', 'o')
  )
  .option('--cache', 'Enable the transposition cache', DEFAULT_ALPHABETA_CONFIG.enableCache)
  .option(
    '--heuristic-ordering',
    'Sort candidate moves by the static heuristic',
    DEFAULT_ALPHABETA_CONFIG.enableHeuristicOrdering
  )
  .option('--no-killers', 'Disable killer-move ordering')
  .option(
    '--killer-capacity <count>',
    'Killer table capacity',
    parseKillerCapacity,
    DEFAULT_ALPHABETA_CONFIG.killerCapacity
  )
  .option('--playouts <count>', 'Random playouts per rollout estimate', parsePlayouts, DEFAULT_PLAYOUTS)
  .option('--verbose', 'Enable detailed logging')
  .action((seed: number, options: CliOptions) => {
    try {
      if (options.verbose) {
        enableVerbose();
      }

      logger.info(`Seed: ${seed}, engine: ${options.engine}, first: ${options.first}`);

      const game = playGame({
        seed,
        engine: options.engine,
        firstSide: options.first,
        search: {
          enableCache: options.cache,
          enableHeuristicOrdering: options.heuristicOrdering,
          enableKillers: options.killers,
          killerCapacity: options.killerCapacity,
        },
        playouts: options.playouts,
        onTurn: turn => console.log(formatTurn(turn, options.engine)),
      });

      console.log(formatResult(game.winner));
      process.exitCode = 0;
    } catch (error: unknown) {
      if (error instanceof Error) {
        console.error('Error:', error.stack ?? error.message);
      } else {
        console.error('Error:', error);
      }
      process.exitCode = 1;
    }
  });

program.parse(process.argv);
