export type Config = {
  host: string;
  port: number;
  // OpenAI-compatible base URL; the client posts to `${chatApiBaseUrl}/chat/completions`
  chatApiBaseUrl: string;
  chatModel: string;
  chatTitle: string;
  chatSubtitle: string;
};

function resolvePort(): number {
  const port = Number(process.env.PORT ?? 3000);
  return Number.isInteger(port) && port > 0 ? port : 3000;
}

// Centralized config; all values can be overridden via env.
export const config: Config = {
  host: process.env.HOST ?? '0.0.0.0',
  port: resolvePort(),
  chatApiBaseUrl: process.env.CHAT_API_BASE_URL ?? 'https://openrouter.ai/api/v1',
  chatModel: process.env.CHAT_MODEL ?? 'deepseek/deepseek-r1:free',
  chatTitle: process.env.CHAT_TITLE ?? 'DeepSeek R1 Chatbot Demo',
  chatSubtitle: process.env.CHAT_SUBTITLE ?? 'Interact with DeepSeek R1 for free using OpenRouter API'
};
