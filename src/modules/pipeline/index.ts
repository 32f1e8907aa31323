// Card pipeline exports
export { CardPipeline } from './card-pipeline.js';
export type { CardPipelineDeps } from './card-pipeline.js';
export { parseIntent } from './intents.js';
export { validateImage } from './image-validation.js';
export type { ImageFormat } from './image-validation.js';
