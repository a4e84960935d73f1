import type { ChatMessage } from "./chat.js";

export interface ApiErrorResponse {
  error: string;
  details?: unknown;
}

export interface GenerateRequest {
  prompt: string;
  model?: string | undefined;
  temperature?: number | undefined;
  max_tokens?: number | undefined;
  context?: string | undefined;
  system_prompt?: string | undefined;
}

export interface GenerateResponse {
  text: string;
  model: string;
  eval_count: number;
  eval_duration_ms: number;
}

export interface ChatRequest {
  messages: ChatMessage[];
  model?: string | undefined;
  temperature?: number | undefined;
  max_tokens?: number | undefined;
}

// Ollama may answer with roles beyond the request roles, e.g. "tool".
export interface ChatReply {
  role: string;
  content: string;
}

export interface ChatResponse {
  message: ChatReply;
  model: string;
  eval_count: number;
  eval_duration_ms: number;
}

export interface ModelsResponse {
  models: string[];
  count: number;
}

export type HealthStatus = "healthy" | "unhealthy";

export interface HealthResponse {
  status: HealthStatus;
  ollama_connected: boolean;
}

export interface ServiceInfoResponse {
  service: string;
  status: "running";
  ollama_url: string;
}
