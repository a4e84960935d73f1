import type { OllamaServiceLike } from "../services/ollamaTypes.js";
import { OllamaService } from "../services/OllamaService.js";

let ollamaServiceSingleton: OllamaServiceLike | null = null;

export function getOllamaServiceSingleton(): OllamaServiceLike {
  if (!ollamaServiceSingleton) {
    ollamaServiceSingleton = OllamaService.fromEnv();
  }

  return ollamaServiceSingleton;
}
