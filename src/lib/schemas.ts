import { z } from "zod";
import type { NoteInput } from "@/types/note";

export const userRoleSchema = z.enum(["child", "parent"]);

export const signupSchema = z.object({
  username: z.string().trim().min(1, "username is required"),
  password: z.string(),
  role: userRoleSchema,
  parent_username: z.string().nullish(),
});

export const loginSchema = z.object({
  username: z.string(),
  password: z.string(),
});

export const folderSchema = z.object({
  name: z.string(),
});

export const checkboxItemSchema = z.object({
  text: z.string(),
  checked: z.boolean().default(false),
});

export const tagsSchema = z.array(z.string());

export const checkboxItemsSchema = z.array(checkboxItemSchema);

// Missing and null optional fields both fall back to the empty value, so a
// PUT without `tags` clears them.
export const noteSchema = z
  .object({
    title: z.string(),
    content: z.string().nullish(),
    tags: tagsSchema.nullish(),
    checkbox_items: checkboxItemsSchema.nullish(),
    folder_id: z.string().nullish(),
  })
  .transform(
    (value): NoteInput => ({
      title: value.title,
      content: value.content ?? "",
      tags: value.tags ?? [],
      checkboxItems: value.checkbox_items ?? [],
      folderId: value.folder_id ?? null,
    })
  );

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
