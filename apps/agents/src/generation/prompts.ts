import { BUNDLE_ENTRY_FILE } from "@pagesmith/shared";
import type { CodeBundle } from "@pagesmith/shared";
import type { DecodedAttachment } from "./attachments";

export const CODE_SYSTEM_PROMPT = [
  "You generate complete static web applications for GitHub Pages.",
  "Return exactly one JSON object mapping relative file paths to full file contents.",
  "Do not use markdown.",
  "Do not add explanatory text.",
  `The entry point must be named ${BUNDLE_ENTRY_FILE}.`,
  "No server-side code, no build step, no npm packages; libraries only through CDN links.",
].join("\n");

export const README_SYSTEM_PROMPT = [
  "You write README.md files for small static web applications.",
  "Return only the Markdown document.",
].join("\n");

function bulletList(items: string[], empty: string) {
  return items.length > 0 ? items.map((item) => `- ${item}`).join("\n") : empty;
}

function formatAttachments(attachments: DecodedAttachment[]) {
  if (attachments.length === 0) {
    return "ATTACHMENTS: none";
  }

  return [
    "ATTACHMENTS:",
    ...attachments.map((attachment) =>
      [
        `--- File: ${attachment.name} (Type: ${attachment.mimeType}) ---`,
        attachment.content,
        `--- End of ${attachment.name} ---`,
      ].join("\n")
    ),
  ].join("\n");
}

// Prior files go in verbatim, sorted by path.
function formatPriorBundle(prior: CodeBundle) {
  const files = Object.keys(prior.files)
    .sort()
    .map((name) => [`--- Current file: ${name} ---`, prior.files[name], `--- End of ${name} ---`].join("\n"));

  return [
    "CURRENT APPLICATION (revise it; keep what the instruction does not ask to change):",
    ...files,
  ].join("\n");
}

export function buildCodeGenerationPrompt(input: {
  instruction: string;
  checks: string[];
  attachments: DecodedAttachment[];
  priorBundle?: CodeBundle;
}) {
  return [
    input.priorBundle ? "REVISION REQUEST:" : "PROJECT REQUIREMENTS:",
    input.instruction,
    "",
    "EVALUATION CRITERIA (all must pass):",
    bulletList(input.checks, "- none given"),
    "",
    formatAttachments(input.attachments),
    ...(input.priorBundle ? ["", formatPriorBundle(input.priorBundle)] : []),
    "",
    "OUTPUT FORMAT:",
    `{ "${BUNDLE_ENTRY_FILE}": "<!DOCTYPE html>...", "style.css": "...", "script.js": "..." }`,
    "Escape newlines and quotes so the object is valid JSON.",
  ].join("\n");
}

export function buildReadmePrompt(input: {
  projectId: string;
  instruction: string;
  checks: string[];
  files: string[];
}) {
  return [
    `PROJECT NAME: ${input.projectId}`,
    "",
    "DESCRIPTION:",
    input.instruction,
    "",
    "FEATURES:",
    bulletList(input.checks, "- see description"),
    "",
    `FILES: ${input.files.join(", ")}`,
    "",
    "Write a README.md with a title, a short description, features, usage, project structure,",
    "and a License section naming the MIT License.",
  ].join("\n");
}
