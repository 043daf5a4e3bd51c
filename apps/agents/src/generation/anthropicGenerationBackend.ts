import type { Logger } from "pino";
import type { CodeBundle, GenerateBundleInput, GenerationBackend } from "@pagesmith/shared";
import { callAnthropic, readNumberEnv, stripCodeFences } from "../providers/llmClient";
import { decodeAttachments } from "./attachments";
import { parseGeneratedFiles } from "./parseGeneratedFiles";
import { CODE_SYSTEM_PROMPT, README_SYSTEM_PROMPT, buildCodeGenerationPrompt, buildReadmePrompt } from "./prompts";

export const README_FILE = "README.md";

/**
 * Generation backend on the Anthropic Messages API: one call for the app files,
 * one for the README. A README failure leaves the bundle without one.
 */
export class AnthropicGenerationBackend implements GenerationBackend {
  private readonly logger: Logger;

  constructor(opts: { logger: Logger }) {
    this.logger = opts.logger;
  }

  async generate(input: GenerateBundleInput): Promise<CodeBundle> {
    const completion = await callAnthropic({
      system: CODE_SYSTEM_PROMPT,
      prompt: buildCodeGenerationPrompt({
        instruction: input.instruction,
        checks: input.checks,
        attachments: decodeAttachments(input.attachments),
        priorBundle: input.priorBundle,
      }),
      maxTokens: readNumberEnv("ANTHROPIC_GENERATION_MAX_TOKENS", 16000),
      signal: input.signal,
    });

    const files = parseGeneratedFiles(completion.text);
    if (!(README_FILE in files)) {
      const readme = await this.generateReadme(input, Object.keys(files));
      if (readme) {
        files[README_FILE] = readme;
      }
    }

    return { files };
  }

  private async generateReadme(input: GenerateBundleInput, files: string[]) {
    try {
      const completion = await callAnthropic({
        system: README_SYSTEM_PROMPT,
        prompt: buildReadmePrompt({
          projectId: input.projectId,
          instruction: input.instruction,
          checks: input.checks,
          files,
        }),
        maxTokens: readNumberEnv("ANTHROPIC_README_MAX_TOKENS", 2000),
        signal: input.signal,
      });
      return stripCodeFences(completion.text);
    } catch (err) {
      // An aborted signal means the whole generation timed out; that must still fail the stage.
      if (input.signal.aborted) {
        throw err;
      }
      this.logger.warn(
        { err, project_id: input.projectId, round_number: input.roundNumber },
        "README generation failed; publishing without one"
      );
      return undefined;
    }
  }
}
