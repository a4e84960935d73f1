import { Ollama, type Options } from "ollama";
import type { ChatResponse, GenerateResponse, ModelsResponse } from "@graphrag-demo/shared";
import { appConfig } from "../config.js";
import { buildGenerationPrompt } from "../prompts/generation.js";
import type {
  ChatInput,
  GenerateInput,
  ModelDetail,
  OllamaCompatibleClient,
  OllamaConfig,
  OllamaServiceLike
} from "./ollamaTypes.js";

const NANOSECONDS_PER_MILLISECOND = 1e6;

export class OllamaService implements OllamaServiceLike {
  readonly host: string;
  private readonly client: OllamaCompatibleClient;
  private readonly config: OllamaConfig;

  constructor(config: OllamaConfig, deps?: { client?: OllamaCompatibleClient }) {
    this.config = {
      ...config,
      host: config.host.replace(/\/+$/, "")
    };
    this.host = this.config.host;
    this.client = deps?.client ?? new Ollama({ host: this.config.host });
  }

  static fromEnv(): OllamaService {
    return new OllamaService({
      host: appConfig.OLLAMA_BASE_URL,
      defaultModel: appConfig.DEFAULT_MODEL,
      defaultTemperature: appConfig.DEFAULT_TEMPERATURE
    });
  }

  async generate(input: GenerateInput): Promise<GenerateResponse> {
    const model = input.model ?? this.config.defaultModel;
    const request: Parameters<OllamaCompatibleClient["generate"]>[0] = {
      model,
      prompt: buildGenerationPrompt(input.prompt, input.context),
      stream: false,
      options: this.buildOptions(input.temperature, input.maxTokens)
    };
    if (input.systemPrompt) {
      request.system = input.systemPrompt;
    }

    const result = await this.client.generate(request);

    return {
      text: result.response ?? "",
      model,
      eval_count: result.eval_count ?? 0,
      eval_duration_ms: toMilliseconds(result.eval_duration)
    };
  }

  async chat(input: ChatInput): Promise<ChatResponse> {
    const model = input.model ?? this.config.defaultModel;
    const result = await this.client.chat({
      model,
      messages: input.messages.map((message) => ({
        role: message.role,
        content: message.content
      })),
      stream: false,
      options: this.buildOptions(input.temperature, input.maxTokens)
    });

    return {
      message: {
        role: result.message.role,
        content: result.message.content
      },
      model,
      eval_count: result.eval_count ?? 0,
      eval_duration_ms: toMilliseconds(result.eval_duration)
    };
  }

  async listModels(): Promise<ModelsResponse> {
    const { models } = await this.client.list();
    return {
      models: models.map((model) => model.name),
      count: models.length
    };
  }

  async listModelDetails(): Promise<ModelDetail[]> {
    const { models } = await this.client.list();
    return models.map((model) => ({
      name: model.name,
      sizeBytes: model.size
    }));
  }

  async checkHealth(): Promise<boolean> {
    try {
      await this.client.list();
      return true;
    } catch {
      return false;
    }
  }

  private buildOptions(temperature?: number, maxTokens?: number): Partial<Options> {
    const options: Partial<Options> = {
      temperature: temperature ?? this.config.defaultTemperature
    };
    if (maxTokens) {
      options.num_predict = maxTokens;
    }
    return options;
  }
}

function toMilliseconds(durationNs: number | undefined): number {
  return (durationNs ?? 0) / NANOSECONDS_PER_MILLISECOND;
}
