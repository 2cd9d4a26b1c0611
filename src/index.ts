/**
 * Microstructure Bot - entry point
 *
 * ENV (see .env.example for the full list):
 *   MODE              - paper | telegram | live (default: paper)
 *   PAPER_LOOPS       - iterations for a paper run (default: 1)
 *   SIGNAL_PROVIDER   - seeded | replay (default: seeded)
 *   TELEGRAM_BOT_TOKEN - required in telegram mode, optional in live mode
 *   RPC_URL, PRIVATE_KEY, TOKEN0_ADDRESS, TOKEN1_ADDRESS, PAIR_ADDRESS,
 *   ROUTER_ADDRESS, NATIVE_PRICE_USD - required in live mode
 *   TX_ROUTE          - public | private_relay (PRIVATE_RELAY_URL)
 *   LIVE_TRADING      - I_UNDERSTAND_THE_RISKS to submit real swaps
 */

import "dotenv/config";
import { loadConfig, type AppConfig } from "./config";
import { createChainHealthChecks, type HealthChecks } from "./core/health";
import { createDefaultSignalRegistry } from "./core/signal-registry";
import { SeededPriceFeed, type PriceFeed } from "./core/signals";
import { MicrostructureBot } from "./core/state-machine";
import { toError } from "./errors/app.errors";
import { PairResolver } from "./integrations/pair-resolver";
import { GitHubIssueClient } from "./lib/github-reporter";
import { DecisionScheduler, type CadenceSource } from "./services/decision-scheduler";
import { AxiosTelegramApi, TelegramCommandService } from "./services/telegram.service";
import { formatBreakerAlert, formatOutcomes, formatTradeAlert } from "./telegram/reports";
import { EthersChainClient } from "./trading/ethers-chain-client";
import { LiveRunner } from "./trading/live-runner";
import {
  entryRouteAllowed,
  PUBLIC_ROUTE_MAX_SLIPPAGE_BPS,
  TradingEngine,
} from "./trading/onchain-executor";
import { PairPriceFeed, createSwapActivityFeed, pairLiquidity } from "./trading/pair-market";
import { formatGwei } from "./utils/gas";
import { ConsoleLogger } from "./utils/logger.util";

const logger = new ConsoleLogger({ includeTimestamp: true });

interface LiveWiring {
  engine: TradingEngine;
  liquidity: () => Promise<number>;
  health: HealthChecks;
  prices: PriceFeed;
  cadence: CadenceSource;
}

/**
 * Chain client, engine and market inputs for live mode
 */
function wireLive(config: Readonly<AppConfig>, signal: AbortSignal): LiveWiring {
  const exec = config.execution;
  if (!exec) throw new Error("live mode without execution config");

  const client = new EthersChainClient({
    rpcUrl: exec.rpcUrl,
    chainId: exec.chainId,
    privateKey: exec.privateKey,
    relayUrl: exec.txRoute === "private_relay" ? exec.privateRelayUrl : undefined,
    logger: logger.child("Chain"),
  });
  const funding = exec.topupSourcePk ? client.withSigner(exec.topupSourcePk) : undefined;
  const engine = new TradingEngine({
    config: exec,
    client,
    funding,
    logger: logger.child("Engine"),
    signal,
  });
  const activity = createSwapActivityFeed(client, exec.pairAddress);
  const quietSwapsMin = config.scheduler.quietSwapsMin;

  return {
    engine,
    liquidity: pairLiquidity(engine),
    health: createChainHealthChecks({
      getGasPrice: () => client.getGasPrice(),
      gasCapGwei: config.risk.gasCapGwei,
      activity: quietSwapsMin > 0 ? activity : undefined,
      quietSwapsMin,
      getBlockNumber: () => client.getBlockNumber(),
      logger: logger.child("Health"),
    }),
    prices: new PairPriceFeed(engine),
    cadence: {
      gasGwei: async () => formatGwei((await client.getGasPrice()) ?? 0n),
      swaps10m: () => (quietSwapsMin > 0 ? activity.swapsLast10m() : Promise.resolve(0)),
    },
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.info(`=== Microstructure Bot (${config.environment}, mode=${config.mode}) ===`);

  const controller = new AbortController();
  const shutdown = (): void => {
    if (controller.signal.aborted) return;
    logger.info("Shutting down...");
    controller.abort();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const signals = createDefaultSignalRegistry().create(config.signals);

  const live = config.mode === "live" ? wireLive(config, controller.signal) : undefined;

  const bot = new MicrostructureBot({
    config: config.risk,
    signals,
    prices: live?.prices ?? new SeededPriceFeed(config.signals.seed),
    health: live?.health,
    logger: logger.child("Bot"),
  });

  const runner =
    live && config.execution
      ? new LiveRunner({
          bot,
          engine: live.engine,
          config: config.execution,
          liquidity: live.liquidity,
          logger: logger.child("Live"),
        })
      : undefined;

  const telegram =
    config.telegram.enabled && config.telegram.botToken
      ? new TelegramCommandService({
          api: new AxiosTelegramApi(config.telegram.botToken),
          bot,
          config: config.telegram,
          environment: config.environment,
          resolver: new PairResolver({ logger: logger.child("PairResolver") }),
          runner,
          logger: logger.child("Telegram"),
        })
      : undefined;

  const { github } = config;
  const issues =
    github.enabled && github.token && github.repo && github.issueNumber !== undefined
      ? {
          client: new GitHubIssueClient(
            { token: github.token, repo: github.repo },
            { logger: logger.child("GitHub") },
          ),
          issue: github.issueNumber,
        }
      : undefined;

  bot.breakers.onTrip((reason, status) => {
    logger.warn(`[Breaker] ${reason} tripped`);
    if (telegram) void telegram.sendAlert(formatBreakerAlert(reason, status));
    if (issues) void issues.client.reportBreakerTrip(issues.issue, reason, status);
  });

  switch (config.mode) {
    case "paper": {
      const outcomes = await bot.run(config.paperLoops);
      for (const line of formatOutcomes(outcomes).split("\n")) logger.info(line);
      return;
    }

    case "telegram": {
      if (!telegram) throw new Error("telegram mode without a bot token");
      await telegram.poll(controller.signal);
      return;
    }

    case "live": {
      if (!live || !runner || !config.execution) throw new Error("live mode without execution wiring");
      if (runner.dryRun) {
        logger.warn("[Live] DRY RUN: set LIVE_TRADING=I_UNDERSTAND_THE_RISKS to submit swaps");
      }
      const { txRoute, slippageBps } = config.execution;
      if (!entryRouteAllowed(txRoute, slippageBps)) {
        logger.warn(
          `[Live] Public route with SLIPPAGE_BPS=${slippageBps}: entries will be refused (max ${PUBLIC_ROUTE_MAX_SLIPPAGE_BPS} bps)`,
        );
      }
      const scheduler = new DecisionScheduler({
        tick: async () => {
          const { trades } = await runner.run(1);
          if (!telegram) return;
          for (const trade of trades) await telegram.sendAlert(formatTradeAlert(trade));
        },
        config: config.scheduler,
        risk: config.risk,
        weakSignalsRatio: () => bot.weakSignalsRatio(),
        cadence: live.cadence,
        logger: logger.child("Scheduler"),
      });
      scheduler.start();
      const polling = telegram ? telegram.poll(controller.signal) : Promise.resolve();
      await new Promise<void>((resolve) => {
        controller.signal.addEventListener("abort", () => resolve(), { once: true });
      });
      scheduler.stop();
      await polling;
      return;
    }
  }
}

main().catch((err: unknown) => {
  const error = toError(err);
  logger.error(`Fatal: ${error.message}`, error);
  process.exit(1);
});
