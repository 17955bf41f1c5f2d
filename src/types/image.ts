export type ImageClassification = 'terminal' | 'diagram' | 'other';

export const SUPPORTED_IMAGE_TYPES = ['image/png', 'image/jpeg', 'image/webp', 'image/heic', 'image/heif'] as const;

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface VisionRequest {
  model: string;
  prompt: string;
  image: {
    mimeType: string;
    data: Buffer;
  };
}

export interface VisionReply {
  text: string;
  usage: TokenUsage | null;
}

export interface VisionModel {
  describe(request: VisionRequest): Promise<VisionReply>;
}

export type ImageAnalysisResult = ImageAnalysisSuccess | ImageAnalysisFailure;

export interface ImageAnalysisSuccess {
  success: true;
  classification: ImageClassification;
  description: string;
  code: string;
  cost: number;
  elapsedMs: number;
}

export interface ImageAnalysisFailure {
  success: false;
  /** Bracketed, human-readable reason, e.g. `[Image skipped: unsupported format (image/gif)]`. */
  error: string;
  cost: 0;
  elapsedMs: number;
}

export interface ImageAnalysisRecord {
  url: string;
  caption: string;
  classification: ImageClassification | 'error';
  cost: number;
  elapsedMs: number;
  descriptionPreview: string;
}

export interface ImageAnalysisService {
  analyze(url: string, caption?: string): Promise<ImageAnalysisResult>;
}
