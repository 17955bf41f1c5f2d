export { BlockTreeExtractor, type BlockTreeExtractorOptions } from './block-extractor.js';
export { ImageAnalyzer, IMAGE_PROMPT, type ImageAnalyzerOptions } from './image-analyzer.js';
export { parseImageResponse, stripCodeFence, type ParsedImageResponse } from './image-response.js';
export { RENDERERS, renderBlock, type ChildMode, type RenderContext, type RenderOutcome, type RendererTable } from './renderers.js';
