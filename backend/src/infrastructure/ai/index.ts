export { IAiClient, AI_CLIENT, AnalyzeOptions } from './IAiClient';
export { BaseAiClient } from './BaseAiClient';
export { GeminiAiClient, GeminiClientOptions, GenerateContentApi } from './GeminiAiClient';
