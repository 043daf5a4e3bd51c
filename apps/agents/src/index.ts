export { AnthropicGenerationBackend, README_FILE } from "./generation/anthropicGenerationBackend";
export { decodeAttachment, decodeAttachments } from "./generation/attachments";
export type { DecodedAttachment } from "./generation/attachments";
export { extractHtmlDocument, parseGeneratedFiles } from "./generation/parseGeneratedFiles";
export { buildCodeGenerationPrompt, buildReadmePrompt } from "./generation/prompts";
export { EvaluationNotificationBackend, evaluationFailurePayload, evaluationPayload } from "./notification/evaluationNotificationBackend";
export { GitHubClient } from "./publication/githubClient";
export {
  GitHubPagesPublicationBackend,
  commitMessageFor,
  pagesUrlFor,
  parsePagesTarget,
} from "./publication/githubPagesPublicationBackend";
export { callAnthropic, extractBalancedJsonObject, stripCodeFences } from "./providers/llmClient";
