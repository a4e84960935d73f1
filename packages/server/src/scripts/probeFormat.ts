import type { ModelDetail } from "../services/ollamaTypes.js";

const BYTES_PER_GB = 1e9;

export function formatModelLine(model: ModelDetail): string {
  return `  - ${model.name} (${(model.sizeBytes / BYTES_PER_GB).toFixed(1)}GB)`;
}

/**
 * Token throughput line for a generation, or null when Ollama reported no
 * tokens or no duration.
 */
export function formatGenerationStats(evalCount: number, evalDurationMs: number): string | null {
  if (evalCount <= 0 || evalDurationMs <= 0) {
    return null;
  }

  const seconds = evalDurationMs / 1000;
  const tokensPerSecond = evalCount / seconds;
  return `Generated ${evalCount} tokens in ${seconds.toFixed(2)}s (${tokensPerSecond.toFixed(1)} tokens/sec)`;
}
