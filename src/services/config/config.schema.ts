import { z } from "zod";

const appEntrySchema = z.object({
  app_id: z.string().min(1),
  repo_root: z.string().optional(),
  build_directory: z.string().optional(),
  default_branch: z.string().optional(),
});

const userSettingsSchema = z
  .object({
    AWS_PROFILE: z.string().optional(),
    AWS_REGION: z.string().optional(),
    apps: z.record(appEntrySchema).nullish(),
  })
  .nullish()
  .transform(s => ({
    aws_profile: s?.AWS_PROFILE,
    aws_region: s?.AWS_REGION,
    apps: s?.apps ?? {},
  }));

// An empty document loads as null/undefined.
export const userConfigSchema = z
  .record(userSettingsSchema)
  .nullish()
  .transform(c => c ?? {});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(i => `${i.path.length ? i.path.join(".") : "(root)"}: ${i.message}`)
    .join("; ");
}
