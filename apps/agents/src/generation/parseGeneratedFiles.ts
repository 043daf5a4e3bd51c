import { z } from "zod";
import { BUNDLE_ENTRY_FILE, UpstreamRejectedError, normalizeBundleFiles } from "@pagesmith/shared";
import { extractBalancedJsonObject, stripCodeFences } from "../providers/llmClient";

const GeneratedFilesSchema = z.record(z.string(), z.string());

// Raw HTML reply: keep from the doctype (or <html>) through the last </html>.
export function extractHtmlDocument(text: string): string | undefined {
  let start = text.indexOf("<!DOCTYPE html>");
  if (start === -1) {
    start = text.indexOf("<html");
  }
  if (start === -1) {
    return undefined;
  }

  const html = text.slice(start);
  const end = html.lastIndexOf("</html>");
  return end === -1 ? html : html.slice(0, end + "</html>".length);
}

/**
 * Turns a model reply into bundle files. JSON objects are preferred; a reply that
 * is a bare HTML document becomes a single-file bundle.
 */
export function parseGeneratedFiles(text: string): Record<string, string> {
  let json: unknown;
  try {
    json = JSON.parse(extractBalancedJsonObject(text));
  } catch (err) {
    const html = extractHtmlDocument(stripCodeFences(text));
    if (html) {
      return { [BUNDLE_ENTRY_FILE]: html };
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new UpstreamRejectedError(`Model output is neither a JSON file map nor an HTML document: ${reason}`);
  }

  const parsed = GeneratedFilesSchema.safeParse(json);
  if (!parsed.success) {
    throw new UpstreamRejectedError("Model output JSON must map file names to string contents.");
  }
  return normalizeBundleFiles(parsed.data);
}
