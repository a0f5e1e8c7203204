import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createOpenAI } from "@ai-sdk/openai";

export interface OpenAIClientOptions {
  apiKey?: string;
  baseURL?: string;
}

export interface GeminiClientOptions {
  apiKey?: string;
}

// Create OpenAI client
export const createOpenAIClient = ({ apiKey, baseURL }: OpenAIClientOptions) =>
  createOpenAI({
    baseURL,
    apiKey,
  });

// Create Google AI client
export const createGeminiClient = ({ apiKey }: GeminiClientOptions) =>
  createGoogleGenerativeAI({
    apiKey,
  });
