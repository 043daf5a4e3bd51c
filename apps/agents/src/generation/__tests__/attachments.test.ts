import { describe, expect, it } from "vitest";
import { decodeAttachment, decodeAttachments } from "../attachments";

describe("decodeAttachment", () => {
  it("decodes base64 data URIs", () => {
    expect(decodeAttachment({ name: "note.txt", url: "data:text/plain;base64,SGVsbG8=" })).toEqual({
      name: "note.txt",
      mimeType: "text/plain",
      content: "Hello",
    });
  });

  it("percent-decodes plain data URIs and defaults the type", () => {
    expect(decodeAttachment({ name: "a", url: "data:,hello%20world" })).toEqual({
      name: "a",
      mimeType: "text/plain",
      content: "hello world",
    });
    expect(decodeAttachment({ name: "rows.csv", url: "data:text/csv,a%2Cb" })).toMatchObject({
      mimeType: "text/csv",
      content: "a,b",
    });
  });

  it("references external URLs instead of fetching them", () => {
    expect(decodeAttachment({ name: "logo", url: "https://example.com/logo.png" })).toEqual({
      name: "logo",
      mimeType: "text/plain",
      content: "[External URL: https://example.com/logo.png]",
    });
  });

  it("reports undecodable data URIs inline", () => {
    expect(decodeAttachment({ name: "bad", url: "data:text/plain" }).content).toBe(
      "[Failed to decode: malformed data URI]"
    );
    expect(decodeAttachment({ name: "bad", url: "data:text/plain,%E0%A4%A" }).content).toBe(
      "[Failed to decode: URI malformed]"
    );
  });

  it("keeps attachment order", () => {
    const decoded = decodeAttachments([
      { name: "one", url: "data:,1" },
      { name: "two", url: "data:,2" },
    ]);
    expect(decoded.map((attachment) => attachment.content)).toEqual(["1", "2"]);
  });
});
