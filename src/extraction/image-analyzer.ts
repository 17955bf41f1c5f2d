import axios, { type AxiosInstance } from 'axios';
import type { Logger } from 'winston';
import { calcCost, type PricingTable } from '../billing/pricing.js';
import {
  SUPPORTED_IMAGE_TYPES,
  type ImageAnalysisFailure,
  type ImageAnalysisResult,
  type ImageAnalysisService,
  type VisionModel,
} from '../types/index.js';
import { errorMessage } from '../utils/errors.js';
import { parseImageResponse } from './image-response.js';

export interface ImageAnalyzerOptions {
  vision: VisionModel;
  model: string;
  pricing: PricingTable;
  timeoutMs?: number;
  maxRedirects?: number;
  http?: AxiosInstance;
  logger?: Logger;
}

export const IMAGE_PROMPT = [
  'Analyze this image and answer in exactly the format below.',
  '',
  'TYPE: terminal or diagram or other',
  '(terminal = terminal/shell/command output/console capture, diagram = diagram/flowchart/architecture drawing, other = any other screenshot, table or chart)',
  '',
  'DESCRIPTION: one or two sentences summarizing the key content (no code blocks)',
  '',
  'CODE:',
  'If there is code or command output, extract it wrapped in ```. Otherwise leave it empty.',
  '',
  'Rules:',
  '- DESCRIPTION is at most two sentences',
  '- For terminal images keep DESCRIPTION short and put the key commands/output in CODE',
  '- For diagram images summarize the components and the flow in DESCRIPTION',
  '- If there is no code, omit the CODE: line entirely',
].join('\n');

function isSupportedType(mimeType: string): boolean {
  return SUPPORTED_IMAGE_TYPES.some((type) => type === mimeType);
}

/**
 * Downloads an image and asks a vision model to classify and describe it.
 * Download and format failures resolve to a zero-cost failure result.
 */
export class ImageAnalyzer implements ImageAnalysisService {
  private readonly vision: VisionModel;
  private readonly model: string;
  private readonly pricing: PricingTable;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly http: AxiosInstance;
  private readonly logger: Logger | undefined;

  constructor(options: ImageAnalyzerOptions) {
    this.vision = options.vision;
    this.model = options.model;
    this.pricing = options.pricing;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxRedirects = options.maxRedirects ?? 5;
    this.http = options.http ?? axios.create();
    this.logger = options.logger;
  }

  async analyze(url: string, caption = ''): Promise<ImageAnalysisResult> {
    const startTime = Date.now();
    const fail = (error: string): ImageAnalysisFailure => ({
      success: false,
      error,
      cost: 0,
      elapsedMs: Date.now() - startTime,
    });

    let data: Buffer;
    let mimeType: string;
    try {
      const response = await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        timeout: this.timeoutMs,
        maxRedirects: this.maxRedirects,
        validateStatus: () => true,
      });

      if (response.status >= 400) {
        return fail(`[Image could not be downloaded: HTTP ${response.status}]`);
      }

      data = Buffer.from(response.data);
      const contentType = response.headers['content-type'];
      mimeType = (typeof contentType === 'string' ? contentType : 'image/png').split(';')[0]?.trim() ?? '';
    } catch (error) {
      this.logger?.warn('Image download failed', { url, error: errorMessage(error) });
      return fail(`[Image could not be downloaded: ${errorMessage(error)}]`);
    }

    if (!isSupportedType(mimeType)) {
      return fail(`[Image skipped: unsupported format (${mimeType})]`);
    }

    const prompt = caption ? `${IMAGE_PROMPT}\n\nCaption for reference: ${caption}` : IMAGE_PROMPT;

    // Model errors propagate: they fail the page, not just the image.
    const reply = await this.vision.describe({
      model: this.model,
      prompt,
      image: { mimeType, data },
    });

    const cost = reply.usage
      ? calcCost(this.pricing, this.model, reply.usage.inputTokens, reply.usage.outputTokens)
      : 0;

    return {
      success: true,
      ...parseImageResponse(reply.text),
      cost,
      elapsedMs: Date.now() - startTime,
    };
  }
}
