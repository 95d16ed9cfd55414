import process from 'node:process';

import OpenAI from 'openai';

const DEFAULT_TIMEOUT_MS = 20_000;

let cachedClient: OpenAI | null = null;

// Retries are left to the caller so every attempt passes through the llm rate limit.
export function getOpenAIClient(): OpenAI {
  if (!cachedClient) {
    const timeout = Number.parseInt(process.env.OPENAI_TIMEOUT_MS ?? '', 10);
    cachedClient = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY,
      timeout: Number.isNaN(timeout) ? DEFAULT_TIMEOUT_MS : timeout,
      maxRetries: 0,
    });
  }
  return cachedClient;
}

export function isOpenAIConfigured(): boolean {
  return Boolean(process.env.OPENAI_API_KEY);
}
