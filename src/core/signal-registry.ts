/**
 * Signal Provider Registry
 *
 * Explicit table of provider factories keyed by name. The table is populated
 * at startup from static code; SIGNAL_PROVIDER picks an entry.
 */

import * as fs from "node:fs";
import type { SignalConfig } from "../config/schema";
import { ConfigurationError } from "../errors/app.errors";
import {
  ReplaySignalProvider,
  SeededSignalProvider,
  parseSnapshot,
  type SignalProvider,
  type SignalSnapshot,
} from "./signals";

export type SignalProviderFactory = (config: SignalConfig) => SignalProvider;

export class SignalProviderRegistry {
  private readonly factories = new Map<string, SignalProviderFactory>();

  register(key: string, factory: SignalProviderFactory): this {
    if (this.factories.has(key)) {
      throw new ConfigurationError(`Signal provider "${key}" already registered`);
    }
    this.factories.set(key, factory);
    return this;
  }

  has(key: string): boolean {
    return this.factories.has(key);
  }

  keys(): string[] {
    return [...this.factories.keys()].sort();
  }

  /**
   * @throws ConfigurationError for an unknown key
   */
  create(config: SignalConfig): SignalProvider {
    const factory = this.factories.get(config.provider);
    if (!factory) {
      throw new ConfigurationError(
        `Unknown signal provider "${config.provider}" (available: ${this.keys().join(", ")})`,
      );
    }
    return factory(config);
  }
}

/**
 * Load replay snapshots from a JSON array file
 */
export function loadReplaySnapshots(filePath: string): SignalSnapshot[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read replay file ${filePath}`,
      err instanceof Error ? err : undefined,
    );
  }
  if (!Array.isArray(parsed) || parsed.length === 0) {
    throw new ConfigurationError(
      `Replay file ${filePath} must contain a non-empty array of snapshots`,
    );
  }
  return parsed.map((entry: unknown, i) => {
    const snapshot = parseSnapshot(entry);
    if (!snapshot) {
      throw new ConfigurationError(`Replay file ${filePath}: entry ${i} is not a valid snapshot`);
    }
    return snapshot;
  });
}

/**
 * Registry with the built-in providers
 */
export function createDefaultSignalRegistry(): SignalProviderRegistry {
  return new SignalProviderRegistry()
    .register("seeded", (config) => new SeededSignalProvider(config.seed))
    .register("replay", (config) => {
      if (!config.replayFile) {
        throw new ConfigurationError(
          "SIGNAL_REPLAY_FILE is required for the replay signal provider",
        );
      }
      return new ReplaySignalProvider(loadReplaySnapshots(config.replayFile));
    });
}
