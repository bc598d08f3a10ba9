export { envSchema, parseEnv } from "./env.js";
export {
  DEFAULT_CHUNK_TABLE,
  DEFAULT_IMAGE_QUALITY_WEIGHTS,
  triggerCategorySchema,
  loadTriggerCategories,
  applyThresholdOverrides,
} from "./defaults.js";
