export { embedFiles, BINARY_EXTENSIONS } from './fileEmbedder.js';
export type { EmbedOptions, EmbedResult } from './fileEmbedder.js';
export {
  validateReviewInput,
  inferProjectRoot,
  resolveProjectRoot,
  prepareReviewRequest,
} from './request.js';
export type { ReviewInput, ValidatedInput } from './request.js';
