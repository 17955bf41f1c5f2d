import type { GenerateContentResponseUsageMetadata, GoogleGenAI } from '@google/genai';
import type {
  RetrievalAnswer,
  RetrievalModel,
  TokenCounter,
  TokenUsage,
  VisionModel,
  VisionReply,
  VisionRequest,
} from '../types/index.js';

function toUsage(metadata: GenerateContentResponseUsageMetadata | undefined): TokenUsage | null {
  if (!metadata) return null;
  return {
    inputTokens: metadata.promptTokenCount ?? 0,
    outputTokens: metadata.candidatesTokenCount ?? 0,
  };
}

/** Gemini generate/count endpoints behind the vision, token counting and retrieval seams. */
export class GeminiModels implements VisionModel, TokenCounter, RetrievalModel {
  private readonly ai: GoogleGenAI;

  constructor(ai: GoogleGenAI) {
    this.ai = ai;
  }

  async describe({ model, prompt, image }: VisionRequest): Promise<VisionReply> {
    const response = await this.ai.models.generateContent({
      model,
      contents: [
        {
          role: 'user',
          parts: [{ text: prompt }, { inlineData: { mimeType: image.mimeType, data: image.data.toString('base64') } }],
        },
      ],
    });
    return { text: response.text ?? '', usage: toUsage(response.usageMetadata) };
  }

  async countTokens(model: string, text: string): Promise<number> {
    const response = await this.ai.models.countTokens({ model, contents: text });
    return response.totalTokens ?? 0;
  }

  async ask(storeName: string, model: string, query: string): Promise<RetrievalAnswer> {
    const response = await this.ai.models.generateContent({
      model,
      contents: query,
      config: {
        tools: [{ fileSearch: { fileSearchStoreNames: [storeName] } }],
      },
    });

    const grounding = response.candidates?.[0]?.groundingMetadata;
    const usage = toUsage(response.usageMetadata);
    return {
      answer: response.text ?? '',
      grounding: grounding ? JSON.stringify(grounding) : null,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
    };
  }
}
