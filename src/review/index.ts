export { DualReviewCoordinator } from './coordinator.js';
export type { CoordinatorConfig, CoordinatorDeps, ReviewCallbacks } from './coordinator.js';
export { runReviewer, isDisabledModel } from './reviewer.js';
export type { ReviewerDeps, ReviewerSettings } from './reviewer.js';
export { Synthesizer, reviewText } from './synthesizer.js';
export type { SynthesisResult, SynthesizerOptions } from './synthesizer.js';
export { ToolCallBridge, DEFAULT_TOOL_BRIDGE_LIMITS } from './toolBridge.js';
export type { BridgeState, ToolBridgeLimits } from './toolBridge.js';
export {
  buildSystemPrompt,
  buildReviewPrompt,
  buildFinalizeMessage,
  buildSynthesisSystemPrompt,
  buildSynthesisMessage,
  fitEmbeddedFiles,
} from './prompt.js';
