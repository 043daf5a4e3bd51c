import { z } from "zod";
import { BUNDLE_ENTRY_FILE } from "../constants";

const BundlePathSchema = z
  .string()
  .min(1)
  .max(200)
  .refine((value) => !value.startsWith("/") && !value.includes("\\"), {
    message: "bundle paths must be relative and use '/' separators",
  })
  .refine((value) => value.split("/").every((segment) => segment !== "" && segment !== "." && segment !== ".."), {
    message: "bundle paths cannot contain empty, '.' or '..' segments",
  });

/**
 * Generated static site: relative path -> file contents.
 * The entry file must exist so the bundle is servable as-is.
 */
export const CodeBundleSchema = z
  .object({
    files: z.record(BundlePathSchema, z.string()),
  })
  .strict()
  .superRefine((bundle, ctx) => {
    if (!(BUNDLE_ENTRY_FILE in bundle.files)) {
      ctx.addIssue({
        code: "custom",
        path: ["files"],
        message: `bundle must include ${BUNDLE_ENTRY_FILE}`,
      });
    }
  });

export type CodeBundle = z.infer<typeof CodeBundleSchema>;

/**
 * Renames a lone HTML page to index.html when the model picked another name.
 * Anything else is left for CodeBundleSchema to accept or reject.
 */
export function normalizeBundleFiles(files: Record<string, string>): Record<string, string> {
  if (BUNDLE_ENTRY_FILE in files) {
    return files;
  }

  const htmlFiles = Object.keys(files).filter((name) => name.toLowerCase().endsWith(".html"));
  if (htmlFiles.length !== 1) {
    return files;
  }

  const [only] = htmlFiles;
  const { [only]: content, ...rest } = files;
  return { ...rest, [BUNDLE_ENTRY_FILE]: content };
}
