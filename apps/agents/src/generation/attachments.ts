import type { Attachment } from "@pagesmith/shared";

export type DecodedAttachment = {
  name: string;
  mimeType: string;
  content: string;
};

const DATA_URI = /^data:([^;,]*)((?:;[^;,]*)*),(.*)$/s;

/**
 * Inlines data: URI attachments as text for the prompt. Other URLs are passed
 * through as a reference line; a data URI that does not decode is reported inline.
 */
export function decodeAttachment(attachment: Attachment): DecodedAttachment {
  if (!attachment.url.startsWith("data:")) {
    return { name: attachment.name, mimeType: "text/plain", content: `[External URL: ${attachment.url}]` };
  }

  const match = DATA_URI.exec(attachment.url);
  if (!match) {
    return { name: attachment.name, mimeType: "text/plain", content: "[Failed to decode: malformed data URI]" };
  }

  const [, mimeType, params, payload] = match;
  const isBase64 = params.split(";").includes("base64");

  let content: string;
  try {
    content = isBase64 ? Buffer.from(payload, "base64").toString("utf8") : decodeURIComponent(payload);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { name: attachment.name, mimeType: "text/plain", content: `[Failed to decode: ${reason}]` };
  }

  return { name: attachment.name, mimeType: mimeType || "text/plain", content };
}

export function decodeAttachments(attachments: Attachment[]) {
  return attachments.map(decodeAttachment);
}
