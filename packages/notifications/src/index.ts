export { TriggerCategoryCache } from "./category-cache.js";
export type { PhraseEmbedder, TriggerCategoryCacheOptions } from "./category-cache.js";
export { TriggerEngine, notificationEventId } from "./trigger-engine.js";
