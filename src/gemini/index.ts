export { GeminiFileSearchGateway } from './gateway.js';
export { GeminiModels } from './models.js';
