import axios, { type AxiosInstance } from 'axios';
import { describe, expect, it } from 'vitest';
import { IMAGE_PROMPT, ImageAnalyzer } from '../../src/extraction/image-analyzer.js';
import type { VisionReply } from '../../src/types/index.js';
import { FakeVisionModel, silentLogger } from '../helpers/fakes.js';

const IMAGE_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
const PRICING: Record<string, [number, number]> = { 'vision-test': [0.5, 3] };

function httpReturning(status: number, headers: Record<string, string>): AxiosInstance {
  return axios.create({
    adapter: async (config) => ({ data: IMAGE_BYTES, status, statusText: String(status), headers, config }),
  });
}

function httpFailing(message: string): AxiosInstance {
  return axios.create({
    adapter: async () => {
      throw new Error(message);
    },
  });
}

function analyzer(http: AxiosInstance, reply: VisionReply) {
  const vision = new FakeVisionModel(reply);
  return {
    vision,
    analyzer: new ImageAnalyzer({ vision, model: 'vision-test', pricing: PRICING, http, logger: silentLogger() }),
  };
}

const DIAGRAM_REPLY: VisionReply = {
  text: 'TYPE: diagram\nDESCRIPTION: Two services talk.',
  usage: { inputTokens: 1000, outputTokens: 200 },
};

describe('ImageAnalyzer', () => {
  it('fails closed on an HTTP error without calling the model', async () => {
    const { vision, analyzer: subject } = analyzer(httpReturning(404, {}), DIAGRAM_REPLY);
    const result = await subject.analyze('https://img.example/missing.png');

    expect(result).toMatchObject({ success: false, error: '[Image could not be downloaded: HTTP 404]', cost: 0 });
    expect(vision.requests).toEqual([]);
  });

  it('fails closed on a network error', async () => {
    const { analyzer: subject } = analyzer(httpFailing('connect ECONNREFUSED'), DIAGRAM_REPLY);
    const result = await subject.analyze('https://img.example/a.png');
    expect(result).toMatchObject({ success: false, error: '[Image could not be downloaded: connect ECONNREFUSED]' });
  });

  it('skips unsupported formats', async () => {
    const { vision, analyzer: subject } = analyzer(httpReturning(200, { 'content-type': 'image/gif' }), DIAGRAM_REPLY);
    const result = await subject.analyze('https://img.example/anim.gif');

    expect(result).toMatchObject({ success: false, error: '[Image skipped: unsupported format (image/gif)]', cost: 0 });
    expect(vision.requests).toEqual([]);
  });

  it('sends the bytes, base mime type and caption to the model and prices the reply', async () => {
    const { vision, analyzer: subject } = analyzer(
      httpReturning(200, { 'content-type': 'image/png; charset=binary' }),
      DIAGRAM_REPLY
    );
    const result = await subject.analyze('https://img.example/arch.png', 'Architecture');

    expect(vision.requests).toHaveLength(1);
    const [request] = vision.requests;
    expect(request?.model).toBe('vision-test');
    expect(request?.image.mimeType).toBe('image/png');
    expect(request?.image.data.equals(IMAGE_BYTES)).toBe(true);
    expect(request?.prompt).toBe(`${IMAGE_PROMPT}\n\nCaption for reference: Architecture`);

    if (!result.success) throw new Error(result.error);
    expect(result.classification).toBe('diagram');
    expect(result.description).toBe('Two services talk.');
    expect(result.code).toBe('');
    expect(result.cost).toBeCloseTo(0.0011, 12);
  });

  it('assumes png when no content type is sent and costs nothing without usage', async () => {
    const { vision, analyzer: subject } = analyzer(httpReturning(200, {}), { text: 'TYPE: other', usage: null });
    const result = await subject.analyze('https://img.example/plain');

    expect(vision.requests[0]?.image.mimeType).toBe('image/png');
    expect(vision.requests[0]?.prompt).toBe(IMAGE_PROMPT);
    expect(result).toMatchObject({ success: true, classification: 'other', description: 'TYPE: other', cost: 0 });
  });

  it('lets model errors reach the caller', async () => {
    const http = httpReturning(200, { 'content-type': 'image/jpeg' });
    const subject = new ImageAnalyzer({
      vision: {
        describe: async () => {
          throw new Error('quota exceeded');
        },
      },
      model: 'vision-test',
      pricing: PRICING,
      http,
    });
    await expect(subject.analyze('https://img.example/photo.jpg')).rejects.toThrow('quota exceeded');
  });
});
