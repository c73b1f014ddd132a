export {
  PromptTemplate,
  TemplateError,
  renderTemplate,
  assertPlaceholders,
  MISSING_VALUE_POLICIES,
} from "./template.js";
export type {
  PlaceholderValue,
  TemplateValues,
  MissingValuePolicy,
  RenderOptions,
  TemplateErrorCode,
} from "./template.js";
export {
  SUPPORT_ASSISTANT_PROMPT,
  SUPPORT_ASSISTANT_TEMPLATE,
  REQUIRED_PLACEHOLDERS,
  renderSupportPrompt,
} from "./support-assistant.js";
export type { SupportPromptValues } from "./support-assistant.js";
