import type { OllamaServiceLike } from "../services/ollamaTypes.js";
import { formatGenerationStats, formatModelLine } from "./probeFormat.js";

export const PROBE_PROMPT = "What is a knowledge graph? Explain in one sentence.";

type Print = (line: string) => void;

/**
 * Smoke check of a local Ollama: reachability, installed models and one
 * short generation. Returns the process exit code.
 */
export async function probeOllama(
  ollamaService: OllamaServiceLike,
  print: Print = (line) => process.stdout.write(`${line}\n`)
): Promise<number> {
  print(`Checking Ollama at ${ollamaService.host}...`);
  if (!(await ollamaService.checkHealth())) {
    print("Ollama is not accessible. Make sure it is running with: ollama serve");
    return 1;
  }
  print("Ollama is running.");

  const models = await ollamaService.listModelDetails();
  print(`Found ${models.length} models:`);
  for (const model of models) {
    print(formatModelLine(model));
  }

  print(`Prompt: ${PROBE_PROMPT}`);
  const result = await ollamaService.generate({ prompt: PROBE_PROMPT });
  print(`Response: ${result.text}`);

  const stats = formatGenerationStats(result.eval_count, result.eval_duration_ms);
  if (stats) {
    print(stats);
  }
  return 0;
}
