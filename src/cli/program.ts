/**
 * Command-line interface
 *
 * futures-trader market     <symbol> <side> <quantity>
 * futures-trader limit      <symbol> <side> <quantity> <price>
 * futures-trader stop-limit <symbol> <side> <quantity> <price> <stopPrice>
 * futures-trader twap       <symbol> <side> <quantity> <slices> <intervalSeconds>
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import type { OrderIntentInput, TimeInForce } from '../orders/types.js';
import type { TwapFailurePolicy } from '../twap/types.js';

export interface CommandOptions {
  /** Seconds to keep polling a resting order */
  waitSeconds?: number;
  /** Overrides TWAP_FAILURE_POLICY for this run */
  failurePolicy?: TwapFailurePolicy;
}

export type OrderCommandHandler = (
  input: OrderIntentInput,
  options: CommandOptions
) => Promise<void>;

interface RestingOrderOptions {
  tif?: TimeInForce;
  reduceOnly: boolean;
  wait?: number;
}

interface MarketOptions {
  reduceOnly: boolean;
}

interface TwapOptions extends MarketOptions {
  failurePolicy?: TwapFailurePolicy;
}

const TIME_IN_FORCE: readonly TimeInForce[] = ['GTC', 'IOC', 'FOK', 'GTX'];
const FAILURE_POLICIES: readonly TwapFailurePolicy[] = ['halt', 'continue', 'reslice'];

function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new InvalidArgumentError('Must be a non-negative number of seconds.');
  }
  return seconds;
}

function parseTimeInForce(value: string): TimeInForce {
  const tif = TIME_IN_FORCE.find((candidate) => candidate === value.toUpperCase());
  if (!tif) {
    throw new InvalidArgumentError(`Allowed choices are ${TIME_IN_FORCE.join(', ')}.`);
  }
  return tif;
}

function parseFailurePolicy(value: string): TwapFailurePolicy {
  const policy = FAILURE_POLICIES.find((candidate) => candidate === value.toLowerCase());
  if (!policy) {
    throw new InvalidArgumentError(`Allowed choices are ${FAILURE_POLICIES.join(', ')}.`);
  }
  return policy;
}

function restingOrderOptions(command: Command): Command {
  return command
    .addOption(
      new Option('--tif <timeInForce>', 'time in force (GTC, IOC, FOK, GTX)').argParser(
        parseTimeInForce
      )
    )
    .option('--reduce-only', 'only reduce an open position', false)
    .option('--wait <seconds>', 'poll the order until it settles or the time runs out', parseSeconds);
}

export function createProgram(handler: OrderCommandHandler): Command {
  const program = new Command();

  program
    .name('futures-trader')
    .description('Submit orders to the USD-M futures testnet through the execution engine')
    .version('1.0.0');

  program
    .command('market')
    .description('Place a MARKET order')
    .argument('<symbol>', 'trading pair, e.g. BTCUSDT')
    .argument('<side>', 'BUY or SELL')
    .argument('<quantity>', 'order quantity')
    .option('--reduce-only', 'only reduce an open position', false)
    .action(async (symbol: string, side: string, quantity: string, options: MarketOptions) => {
      await handler(
        {
          symbol: symbol.toUpperCase(),
          side: side.toUpperCase(),
          type: 'MARKET',
          quantity,
          reduceOnly: options.reduceOnly,
        },
        {}
      );
    });

  restingOrderOptions(
    program
      .command('limit')
      .description('Place a LIMIT order')
      .argument('<symbol>', 'trading pair, e.g. BTCUSDT')
      .argument('<side>', 'BUY or SELL')
      .argument('<quantity>', 'order quantity')
      .argument('<price>', 'limit price')
  ).action(
    async (
      symbol: string,
      side: string,
      quantity: string,
      price: string,
      options: RestingOrderOptions
    ) => {
      await handler(
        {
          symbol: symbol.toUpperCase(),
          side: side.toUpperCase(),
          type: 'LIMIT',
          quantity,
          price,
          reduceOnly: options.reduceOnly,
          ...(options.tif !== undefined && { timeInForce: options.tif }),
        },
        { waitSeconds: options.wait }
      );
    }
  );

  restingOrderOptions(
    program
      .command('stop-limit')
      .description('Place a STOP_LIMIT order')
      .argument('<symbol>', 'trading pair, e.g. BTCUSDT')
      .argument('<side>', 'BUY or SELL')
      .argument('<quantity>', 'order quantity')
      .argument('<price>', 'limit price once triggered')
      .argument('<stopPrice>', 'trigger price')
  ).action(
    async (
      symbol: string,
      side: string,
      quantity: string,
      price: string,
      stopPrice: string,
      options: RestingOrderOptions
    ) => {
      await handler(
        {
          symbol: symbol.toUpperCase(),
          side: side.toUpperCase(),
          type: 'STOP_LIMIT',
          quantity,
          price,
          stopPrice,
          reduceOnly: options.reduceOnly,
          ...(options.tif !== undefined && { timeInForce: options.tif }),
        },
        { waitSeconds: options.wait }
      );
    }
  );

  program
    .command('twap')
    .description('Split a MARKET order into equal slices sent at a fixed interval')
    .argument('<symbol>', 'trading pair, e.g. BTCUSDT')
    .argument('<side>', 'BUY or SELL')
    .argument('<quantity>', 'total quantity')
    .argument('<slices>', 'number of child orders')
    .argument('<intervalSeconds>', 'seconds between child orders')
    .option('--reduce-only', 'only reduce an open position', false)
    .addOption(
      new Option(
        '--failure-policy <policy>',
        'what a failed slice does to the run (halt, continue, reslice)'
      ).argParser(parseFailurePolicy)
    )
    .action(
      async (
        symbol: string,
        side: string,
        quantity: string,
        slices: string,
        intervalSeconds: string,
        options: TwapOptions
      ) => {
        await handler(
          {
            symbol: symbol.toUpperCase(),
            side: side.toUpperCase(),
            type: 'TWAP',
            quantity,
            sliceCount: Number(slices),
            intervalSeconds: Number(intervalSeconds),
            reduceOnly: options.reduceOnly,
          },
          { failurePolicy: options.failurePolicy }
        );
      }
    );

  return program;
}
