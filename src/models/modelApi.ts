import type { CompletionRequest, CompletionResponse, ModelInfo } from '../types.js';

/**
 * Narrow contract to the model-serving API.
 * Implementations reject with a `transport_error` ReviewError on network or provider failure,
 * or with the signal's abort reason when the caller's signal fires.
 */
export interface ModelApi {
  listModels(signal?: AbortSignal): Promise<readonly ModelInfo[]>;
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
