import type {
  ChatRequest as OllamaChatRequest,
  ChatResponse as OllamaChatResponse,
  GenerateRequest as OllamaGenerateRequest,
  GenerateResponse as OllamaGenerateResponse,
  ModelResponse
} from "ollama";
import type {
  ChatMessage,
  ChatResponse,
  GenerateResponse,
  ModelsResponse
} from "@graphrag-demo/shared";

export interface OllamaConfig {
  host: string;
  defaultModel: string;
  defaultTemperature: number;
}

export interface GenerateInput {
  prompt: string;
  model?: string | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
  context?: string | undefined;
  systemPrompt?: string | undefined;
}

export interface ChatInput {
  messages: ChatMessage[];
  model?: string | undefined;
  temperature?: number | undefined;
  maxTokens?: number | undefined;
}

export interface ModelDetail {
  name: string;
  sizeBytes: number;
}

/**
 * The subset of the `ollama` client used here. Non-streaming calls only.
 */
export interface OllamaCompatibleClient {
  generate(
    request: OllamaGenerateRequest & { stream: false }
  ): Promise<Pick<OllamaGenerateResponse, "response" | "eval_count" | "eval_duration">>;
  chat(
    request: OllamaChatRequest & { stream: false }
  ): Promise<Pick<OllamaChatResponse, "message" | "eval_count" | "eval_duration">>;
  list(): Promise<{ models: Array<Pick<ModelResponse, "name" | "size">> }>;
}

export interface OllamaServiceLike {
  readonly host: string;
  generate(input: GenerateInput): Promise<GenerateResponse>;
  chat(input: ChatInput): Promise<ChatResponse>;
  listModels(): Promise<ModelsResponse>;
  listModelDetails(): Promise<ModelDetail[]>;
  checkHealth(): Promise<boolean>;
}
