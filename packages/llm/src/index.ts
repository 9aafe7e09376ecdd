export {
  createActivityPlanGenerator,
  buildActivityPlanUserPrompt,
  truncatePromptInput,
  ActivityPlanGeneratorError,
  INPUT_TRUNCATED_NOTICE,
  type ActivityPlanGeneratorFailureCode,
  type CreateActivityPlanGeneratorOptions,
} from "./activity-plan-generator.ts";
export {
  ACTIVITY_PLAN_PROMPT_VERSION,
  ACTIVITY_PLAN_SYSTEM_PROMPT,
} from "./prompts/activity-plan-system-prompt.ts";
export {
  OUTPUT_VALIDATOR_VERSION,
  PLAN_PROHIBITED_PATTERNS_VERSION,
  PLAN_PROHIBITED_PATTERNS,
  validateModelOutput,
  type OutputViolation,
  type ValidateModelOutputResult,
} from "./output-validator.ts";
export {
  parseActivityPlanOutput,
  ActivityPlanOutputSchemaError,
} from "./schemas/activity-plan-output.schema.ts";
export {
  createAnthropicProvider,
  getDefaultLlmProvider,
  LlmProviderError,
  type LlmProvider,
  type LlmProviderRequest,
  type LlmProviderResponse,
} from "./provider.ts";
