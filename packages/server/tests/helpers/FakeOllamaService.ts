import type { ChatResponse, GenerateResponse, ModelsResponse } from "@graphrag-demo/shared";
import { buildGenerationPrompt } from "../../src/prompts/generation.js";
import type {
  ChatInput,
  GenerateInput,
  ModelDetail,
  OllamaServiceLike
} from "../../src/services/ollamaTypes.js";

interface FakeOllamaServiceOptions {
  healthy?: boolean;
  models?: ModelDetail[];
  text?: string;
  evalCount?: number;
  evalDurationMs?: number;
  failWith?: unknown;
}

export class FakeOllamaService implements OllamaServiceLike {
  readonly host = "http://ollama.test:11434";
  lastGenerateInput: GenerateInput | null = null;
  lastForwardedPrompt: string | null = null;
  lastChatInput: ChatInput | null = null;

  private readonly healthy: boolean;
  private readonly models: ModelDetail[];
  private readonly text: string;
  private readonly evalCount: number;
  private readonly evalDurationMs: number;
  private readonly failWith: unknown;

  constructor(options: FakeOllamaServiceOptions = {}) {
    this.healthy = options.healthy ?? true;
    this.models = options.models ?? [
      { name: "llama3.2:latest", sizeBytes: 2_019_393_189 },
      { name: "mistral:7b", sizeBytes: 4_113_301_824 }
    ];
    this.text = options.text ?? "GraphRAG retrieves context from a knowledge graph.";
    this.evalCount = options.evalCount ?? 12;
    this.evalDurationMs = options.evalDurationMs ?? 480;
    this.failWith = options.failWith;
  }

  async generate(input: GenerateInput): Promise<GenerateResponse> {
    this.lastGenerateInput = input;
    this.lastForwardedPrompt = buildGenerationPrompt(input.prompt, input.context);
    this.throwIfFailing();
    return {
      text: this.text,
      model: input.model ?? "llama3.2:latest",
      eval_count: this.evalCount,
      eval_duration_ms: this.evalDurationMs
    };
  }

  async chat(input: ChatInput): Promise<ChatResponse> {
    this.lastChatInput = input;
    this.throwIfFailing();
    return {
      message: { role: "assistant", content: this.text },
      model: input.model ?? "llama3.2:latest",
      eval_count: this.evalCount,
      eval_duration_ms: this.evalDurationMs
    };
  }

  async listModels(): Promise<ModelsResponse> {
    this.throwIfFailing();
    return {
      models: this.models.map((model) => model.name),
      count: this.models.length
    };
  }

  async listModelDetails(): Promise<ModelDetail[]> {
    this.throwIfFailing();
    return [...this.models];
  }

  async checkHealth(): Promise<boolean> {
    return this.healthy;
  }

  private throwIfFailing(): void {
    if (this.failWith !== undefined) {
      throw this.failWith;
    }
  }
}
