/**
 * Editor configuration: validated with zod, defaults filled in.
 */

import { z } from "zod";

export const EditorConfigSchema = z.object({
  maxWidth: z.number().positive().default(300),
  windowTitle: z.string().min(1).default("Font definitions"),
  errorColor: z
    .string()
    .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, "Expected a hex colour like #8b0000")
    .default("#8b0000"),
});

export type EditorConfig = z.infer<typeof EditorConfigSchema>;
export type EditorConfigInput = z.input<typeof EditorConfigSchema>;

export class EditorConfigError extends Error {
  readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(
      `Invalid editor config: ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "EditorConfigError";
    this.issues = issues;
  }
}

export function parseEditorConfig(input: EditorConfigInput = {}): EditorConfig {
  const result = EditorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new EditorConfigError(result.error.issues);
  }
  return result.data;
}
