import { ConfigError } from "../errors.js";
import type { ChunkingStrategy } from "./types.js";
import { PageChunker } from "./page-chunker.js";
import { SlidingWindowChunker } from "./sliding-window-chunker.js";

const registry = new Map<string, ChunkingStrategy>();

export function registerChunkingStrategy(strategy: ChunkingStrategy): void {
  registry.set(strategy.name, strategy);
}

export function getChunkingStrategy(name: string): ChunkingStrategy {
  const strategy = registry.get(name);
  if (!strategy) {
    throw new ConfigError(
      `Unknown chunking strategy: ${name} (available: ${[...registry.keys()].join(", ")})`,
    );
  }
  return strategy;
}

// Register defaults
registerChunkingStrategy(new SlidingWindowChunker());
registerChunkingStrategy(new PageChunker());

export { PageChunker } from "./page-chunker.js";
export { SlidingWindowChunker } from "./sliding-window-chunker.js";
export { slidingWindows } from "./windows.js";
export type { ChunkingOptions, ChunkingStrategy } from "./types.js";
